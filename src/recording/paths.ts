import path from 'node:path';
import type { CaptureKind } from '../types.js';

export const ARTIFACT_DIRECTORIES: Record<CaptureKind, string> = {
  video: 'videos',
  still: 'images'
};

export const ARTIFACT_EXTENSIONS: Record<CaptureKind, string> = {
  video: 'ts',
  still: 'jpg'
};

function pad(value: number) {
  return String(value).padStart(2, '0');
}

/** Local-time `YYYYMMDD-HHMMSS`. */
export function formatTimestamp(at: number | Date): string {
  const date = typeof at === 'number' ? new Date(at) : at;
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function formatEventId(eventName: string, startedAt: number | Date): string {
  return `${eventName}/${formatTimestamp(startedAt)}`;
}

export function artifactPath(
  saveFolder: string,
  kind: CaptureKind,
  cameraId: string,
  at: number | Date
): string {
  return path.join(
    saveFolder,
    ARTIFACT_DIRECTORIES[kind],
    cameraId,
    `${formatTimestamp(at)}.${ARTIFACT_EXTENSIONS[kind]}`
  );
}
