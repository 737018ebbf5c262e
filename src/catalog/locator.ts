import type { CatalogRecord, ResolvedImage, SizeTag } from './types.js';

/**
 * Picks the image URL for a record: the preferred size when present,
 * otherwise the largest remaining size.
 */
export function resolveImageUrl(record: CatalogRecord, preferredSize: SizeTag): string | undefined {
  const exact = record.imageVariants.get(preferredSize);
  if (exact !== undefined) {
    return exact;
  }

  const sizes = [...record.imageVariants.keys()].sort((a, b) => b - a);
  for (const size of sizes) {
    const url = record.imageVariants.get(size);
    if (url !== undefined) {
      return url;
    }
  }
  return undefined;
}

export function toAbsoluteUrl(value: string, baseUrl: string): string {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return value;
  }
}

export function resolveImages(
  records: readonly CatalogRecord[],
  preferredSize: SizeTag,
  baseUrl: string
): { images: ResolvedImage[]; skipped: number } {
  const images: ResolvedImage[] = [];
  let skipped = 0;

  for (const record of records) {
    const url = resolveImageUrl(record, preferredSize);
    if (url === undefined) {
      skipped += 1;
      continue;
    }
    images.push({ externalCode: record.externalCode, url: toAbsoluteUrl(url, baseUrl) });
  }

  return { images, skipped };
}
