import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { artifactPath, formatEventId, formatTimestamp } from '../src/recording/paths.js';
import { canonicalCameraId, normalizeCameraId } from '../src/utils/cameraId.js';

describe('artifact naming', () => {
  const at = new Date(2024, 0, 5, 7, 8, 9);

  it('formats local timestamps with zero padding', () => {
    expect(formatTimestamp(at)).toBe('20240105-070809');
    expect(formatTimestamp(at.getTime())).toBe('20240105-070809');
  });

  it('builds event ids from the event name and session start', () => {
    expect(formatEventId('IsPeople', at)).toBe('IsPeople/20240105-070809');
  });

  it('places videos and stills in per-camera folders', () => {
    expect(artifactPath('/srv/onvifeye', 'video', 'c1', at)).toBe(
      path.join('/srv/onvifeye', 'videos', 'c1', '20240105-070809.ts')
    );
    expect(artifactPath('/srv/onvifeye', 'still', 'c1', at)).toBe(
      path.join('/srv/onvifeye', 'images', 'c1', '20240105-070809.jpg')
    );
  });
});

describe('camera ids', () => {
  it('keeps addresses and replaces unsafe characters', () => {
    expect(normalizeCameraId('10.0.0.5')).toBe('10.0.0.5');
    expect(normalizeCameraId(' Front Door ')).toBe('Front_Door');
    expect(normalizeCameraId('garage/../side')).toBe('garage_.._side');
    expect(normalizeCameraId('..hidden')).toBe('_hidden');
  });

  it('falls back when nothing usable remains', () => {
    expect(normalizeCameraId('   ')).toBe('camera');
    expect(normalizeCameraId(null, { fallback: ' porch ' })).toBe('porch');
  });

  it('compares ids case-insensitively', () => {
    expect(canonicalCameraId('Front Door')).toBe(canonicalCameraId('front door'));
    expect(canonicalCameraId('Front Door')).toBe('front_door');
  });
});
