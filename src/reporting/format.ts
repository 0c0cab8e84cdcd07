const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

export function formatSize(sizeBytes: number): string {
  if (sizeBytes === 0) {
    return '0 B';
  }

  let size = sizeBytes;
  let unitIndex = 0;
  while (size >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
    size /= 1024;
    unitIndex += 1;
  }

  return `${size.toFixed(1)} ${SIZE_UNITS[unitIndex]}`;
}
