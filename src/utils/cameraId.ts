const UNSAFE_SEGMENT = /[^a-z0-9._-]+/gi;

export type NormalizeCameraIdOptions = {
  fallback?: string;
};

function resolveFallback(options?: NormalizeCameraIdOptions) {
  const configured = options?.fallback;
  if (typeof configured === 'string' && configured.trim().length > 0) {
    return configured.trim();
  }
  return 'camera';
}

/**
 * Turns a configured camera id (often an IP address or a free-form label)
 * into a single filesystem path segment.
 */
export function normalizeCameraId(
  value: string | null | undefined,
  options?: NormalizeCameraIdOptions
): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed) {
    return resolveFallback(options);
  }

  const sanitized = trimmed.replace(UNSAFE_SEGMENT, '_').replace(/^\.+/, '_');
  return sanitized.length > 0 ? sanitized : resolveFallback(options);
}

export function canonicalCameraId(value: string | null | undefined): string {
  return normalizeCameraId(value).toLowerCase();
}
