export interface Size {
  width: number;
  height: number;
}

export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export type PageSizeName = 'Letter' | 'A4' | 'Legal' | 'A3';
export type PageSize = PageSizeName | Size;
export type PageOrientation = 'portrait' | 'landscape';

export type TextAlignment = 'left' | 'center' | 'right';

/**
 * Page sizes in PDF points (1/72 inch).
 */
export const PAGE_SIZES: Record<PageSizeName, Size> = {
  Letter: { width: 612, height: 792 },
  A4: { width: 595.28, height: 841.89 },
  Legal: { width: 612, height: 1008 },
  A3: { width: 841.89, height: 1190.55 }
};

/**
 * Resolve a named or explicit page size, swapping the sides for landscape.
 */
export function resolvePageSize(pageSize: PageSize, orientation: PageOrientation = 'portrait'): Size {
  const base = typeof pageSize === 'string' ? PAGE_SIZES[pageSize] : pageSize;
  if (orientation === 'landscape') {
    return { width: base.height, height: base.width };
  }
  return { width: base.width, height: base.height };
}

/**
 * Document metadata written into the PDF info dictionary.
 */
export interface DocumentMetadata {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string[];
  creator?: string;
  createdAt?: Date;
}
