/**
 * @fileoverview Formato legible de tamaños, velocidades y duraciones para UI y logs.
 * @module utils/format
 */

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/** Bytes → "1.5 MB" (base 1024, un decimal). */
export function formatSize(bytes: number): string {
  let value = Math.max(0, bytes);
  for (const unit of SIZE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}

export function formatSpeed(bytesPerSecond: number): string {
  return `${formatSize(Math.floor(bytesPerSecond))}/s`;
}

/** Segundos → "45s", "2m 5s" o "1h 1m"; null → "Desconocido". */
export function formatDuration(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds)) {
    return 'Desconocido';
  }
  const total = Math.max(0, Math.floor(seconds));
  if (total < 60) {
    return `${total}s`;
  }
  if (total < 3600) {
    return `${Math.floor(total / 60)}m ${total % 60}s`;
  }
  return `${Math.floor(total / 3600)}h ${Math.floor((total % 3600) / 60)}m`;
}

export const BYTES_PER_MB = 1024 * 1024;

export function bytesToMb(bytes: number): number {
  return bytes / BYTES_PER_MB;
}
