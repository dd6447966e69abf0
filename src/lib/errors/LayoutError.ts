/**
 * Base class for every error raised by the layout engine.
 */
export class LayoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A content block cannot fit on a page even directly after a page break.
 */
export class BlockTooLargeError extends LayoutError {
  readonly sectionIndex: number;
  readonly blockIndex: number;
  readonly blockHeight: number;
  readonly usableHeight: number;

  constructor(details: {
    sectionIndex: number;
    blockIndex: number;
    blockHeight: number;
    usableHeight: number;
    sectionTitle?: string;
  }) {
    const where = details.sectionTitle
      ? `section ${details.sectionIndex} ("${details.sectionTitle}")`
      : `section ${details.sectionIndex}`;
    super(
      `Block ${details.blockIndex} in ${where} needs ${details.blockHeight}pt ` +
      `but a page only has ${details.usableHeight}pt of usable height`
    );
    this.sectionIndex = details.sectionIndex;
    this.blockIndex = details.blockIndex;
    this.blockHeight = details.blockHeight;
    this.usableHeight = details.usableHeight;
  }
}

/**
 * The drawing surface or the output file failed to write.
 * Any artifact produced so far must be treated as invalid.
 */
export class CanvasIOError extends LayoutError {
  readonly path?: string;

  constructor(message: string, options?: { cause?: unknown; path?: string }) {
    super(message, { cause: options?.cause });
    this.path = options?.path;
  }
}

/**
 * Configuration rejected before any drawing begins.
 */
export class InvalidConfigurationError extends LayoutError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
