import { BaseBlock } from './BaseBlock';
import { TextLinesBlock, DEFAULT_LINE_HEIGHT } from './TextLinesBlock';
import { ImageBlock } from './ImageBlock';
import { TableBlock } from './TableBlock';
import { RuleBlock } from './RuleBlock';
import { SpacerBlock } from './SpacerBlock';
import { PageBreakBlock } from './PageBreakBlock';
import {
  blockEnvelopeSchema,
  imageBlockSchema,
  pageBreakBlockSchema,
  parseOrThrow,
  ruleBlockSchema,
  spacerBlockSchema,
  tableBlockSchema,
  textBlockSchema
} from '../config/schema';
import { InvalidConfigurationError } from '../errors';

export interface BlockFactoryOptions {
  /** Line height for text blocks that do not set one. */
  lineHeight?: number;
  /** Prefix for validation messages, e.g. "sections.0.blocks.2". */
  path?: string;
}

/**
 * Factory function type for creating blocks. Receives the raw data, which
 * it is responsible for validating.
 */
export type BlockBuilder = (data: unknown, options: BlockFactoryOptions) => BaseBlock;

/**
 * Creates blocks from serialized data.
 * Supports registration of custom block types.
 */
export class BlockFactory {
  private static registry: Map<string, BlockBuilder> = new Map();
  private static initialized: boolean = false;

  /**
   * Register a block type builder, replacing any previous one.
   */
  static register(blockType: string, builder: BlockBuilder): void {
    this.ensureInitialized();
    this.registry.set(blockType, builder);
  }

  static unregister(blockType: string): boolean {
    this.ensureInitialized();
    return this.registry.delete(blockType);
  }

  static isRegistered(blockType: string): boolean {
    this.ensureInitialized();
    return this.registry.has(blockType);
  }

  static getRegisteredTypes(): string[] {
    this.ensureInitialized();
    return Array.from(this.registry.keys());
  }

  /**
   * Create a block from serialized data.
   * @throws InvalidConfigurationError if the data is malformed or the type is unknown
   */
  static create(data: unknown, options: BlockFactoryOptions = {}): BaseBlock {
    this.ensureInitialized();

    const envelope = parseOrThrow(blockEnvelopeSchema, data, options.path);
    const builder = this.registry.get(envelope.type);
    if (!builder) {
      const where = options.path ? `${options.path}.type: ` : 'type: ';
      throw new InvalidConfigurationError([
        `${where}Unknown block type "${envelope.type}". Registered types: ${this.getRegisteredTypes().join(', ')}`
      ]);
    }
    return builder(data, options);
  }

  /**
   * Create blocks from a list of serialized blocks.
   * Validation messages carry the index of the offending block.
   */
  static createAll(data: readonly unknown[], options: BlockFactoryOptions = {}): BaseBlock[] {
    return data.map((item, index) =>
      this.create(item, { ...options, path: options.path ? `${options.path}.${index}` : String(index) })
    );
  }

  /**
   * Register the built-in block types.
   * Called automatically on first use.
   */
  static initialize(): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;

    this.registry.set('text', (data, options) =>
      TextLinesBlock.fromData(parseOrThrow(textBlockSchema, data, options.path), options.lineHeight ?? DEFAULT_LINE_HEIGHT)
    );
    this.registry.set('image', (data, options) =>
      ImageBlock.fromData(parseOrThrow(imageBlockSchema, data, options.path))
    );
    this.registry.set('table', (data, options) =>
      TableBlock.fromData(parseOrThrow(tableBlockSchema, data, options.path))
    );
    this.registry.set('rule', (data, options) =>
      RuleBlock.fromData(parseOrThrow(ruleBlockSchema, data, options.path))
    );
    this.registry.set('spacer', (data, options) =>
      SpacerBlock.fromData(parseOrThrow(spacerBlockSchema, data, options.path))
    );
    this.registry.set('page-break', (data, options) => {
      parseOrThrow(pageBreakBlockSchema, data, options.path);
      return new PageBreakBlock();
    });
  }

  private static ensureInitialized(): void {
    if (!this.initialized) {
      this.initialize();
    }
  }

  /**
   * Reset the factory to its initial state.
   * Useful for testing.
   */
  static reset(): void {
    this.registry.clear();
    this.initialized = false;
  }
}
