/**
 * Validation for everything that enters the engine as plain data: layout
 * configuration, theme styles and serialized blocks.
 */

import { z } from 'zod';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { InvalidConfigurationError } from '../errors';
import { parseColor } from '../style/color';
import { REQUIRED_ROLES, Theme } from '../style/Theme';
import { resolvePageSize } from '../types';
import type { Margin, Size } from '../types';

// ============ Primitives ============

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();

export const rgbSchema = z.object({
  r: z.number().min(0).max(1),
  g: z.number().min(0).max(1),
  b: z.number().min(0).max(1)
});

export const colorSchema = z.union([
  z.string().refine(value => parseColor(value) !== null, value => ({ message: `Unrecognised color "${value}"` })),
  rgbSchema
]);

export const styleInitSchema = z.object({
  fontName: z.string().trim().min(1),
  fontSize: positive,
  color: colorSchema.optional()
});

/** Theme role name or inline style. */
export const styleDataSchema = z.union([z.string().min(1), styleInitSchema]);

const alignSchema = z.enum(['left', 'center', 'right']);

// ============ Blocks ============

export const textBlockSchema = z.object({
  type: z.literal('text'),
  lines: z.array(z.string()),
  style: styleDataSchema.optional(),
  lineHeight: positive.optional(),
  x: z.number().finite().optional(),
  align: alignSchema.optional()
});

export const imageBlockSchema = z.object({
  type: z.literal('image'),
  source: z.string().min(1),
  width: positive,
  height: positive,
  x: z.number().finite().optional(),
  align: alignSchema.optional(),
  caption: z.string().optional()
});

export const tableBlockSchema = z.object({
  type: z.literal('table'),
  header: z.array(z.string()).optional(),
  rows: z.array(z.array(z.string())),
  columnWidths: z.array(positive).min(1),
  rowHeight: positive,
  x: z.number().finite().optional(),
  style: styleDataSchema.optional(),
  headerStyle: styleDataSchema.optional(),
  headerFill: colorSchema.optional(),
  borderColor: colorSchema.optional(),
  striped: z.boolean().optional()
}).superRefine((table, ctx) => {
  const columns = table.columnWidths.length;
  if (table.header && table.header.length > columns) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['header'], message: `Header has more cells than the ${columns} columns` });
  }
  table.rows.forEach((row, index) => {
    if (row.length > columns) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rows', index], message: `Row has more cells than the ${columns} columns` });
    }
  });
});

export const ruleBlockSchema = z.object({
  type: z.literal('rule'),
  thickness: positive.optional(),
  color: colorSchema.optional(),
  spacing: nonNegative.optional(),
  width: positive.optional(),
  x: z.number().finite().optional()
});

export const spacerBlockSchema = z.object({
  type: z.literal('spacer'),
  height: nonNegative
});

export const pageBreakBlockSchema = z.object({
  type: z.literal('page-break')
});

/** Any serialized block: only the `type` tag is checked here. */
export const blockEnvelopeSchema = z.object({ type: z.string().min(1) }).passthrough();

// ============ Layout configuration ============

const pageSizeSchema = z.union([
  z.enum(['Letter', 'A4', 'Legal', 'A3']),
  z.object({ width: positive, height: positive })
]);

const marginSchema = z.object({
  top: positive.default(50),
  right: positive.default(50),
  bottom: positive.default(50),
  left: positive.default(50)
});

const titlePageSchema = z.object({
  lines: z.array(z.object({
    text: z.string(),
    role: z.string().min(1).default('subtitle')
  })).min(1),
  /** Distance of the first baseline from the top edge. */
  top: nonNegative.default(100),
  spacing: positive.default(50),
  rule: z.object({
    /** Distance of the rule from the top edge. */
    offset: nonNegative,
    color: colorSchema.optional(),
    thickness: positive.default(1)
  }).optional()
});

const metadataSchema = z.object({
  title: z.string().optional(),
  author: z.string().optional(),
  subject: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  creator: z.string().optional(),
  createdAt: z.coerce.date().optional()
});

export const layoutConfigSchema = z.object({
  pageSize: pageSizeSchema.default('Letter'),
  orientation: z.enum(['portrait', 'landscape']).default('portrait'),
  margins: marginSchema.default({}),
  /** Default line height for text blocks built from data. */
  lineHeight: positive.default(15),
  footerText: z.string().default(''),
  footerOffset: nonNegative.default(20),
  continuationText: z.string().default('{title} (continued)'),
  continuationOffset: nonNegative.default(30),
  titleHeight: nonNegative.default(30),
  startSectionsOnNewPage: z.boolean().default(false),
  theme: z.union([z.instanceof(Theme), z.record(z.string(), styleInitSchema)]).optional(),
  titlePage: titlePageSchema.optional(),
  metadata: metadataSchema.optional()
}).superRefine((config, ctx) => {
  const page = resolvePageSize(config.pageSize, config.orientation);
  const { top, right, bottom, left } = config.margins;
  const usableHeight = page.height - top - bottom;

  if (usableHeight <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['margins'],
      message: `Top and bottom margins (${top} + ${bottom}) leave no room on a page ${page.height}pt high`
    });
  } else if (config.titleHeight > usableHeight) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['titleHeight'],
      message: `Section titles (${config.titleHeight}pt) do not fit in the usable height of ${usableHeight}pt`
    });
  }
  if (page.width - left - right <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['margins'],
      message: `Left and right margins (${left} + ${right}) leave no room on a page ${page.width}pt wide`
    });
  }

  if (config.theme instanceof Theme) {
    const missing = config.theme.missingRoles(REQUIRED_ROLES);
    if (missing.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['theme'], message: `Theme is missing roles: ${missing.join(', ')}` });
    }
  }

  if (config.titlePage) {
    const { lines, top: firstBaseline, spacing } = config.titlePage;
    const lastBaseline = page.height - firstBaseline - (lines.length - 1) * spacing;
    if (lastBaseline < bottom) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['titlePage'],
        message: `Title page lines run past the bottom margin (last baseline at ${lastBaseline}pt)`
      });
    }
  }
});

export type LayoutConfigInput = z.input<typeof layoutConfigSchema>;
export type LayoutConfig = z.output<typeof layoutConfigSchema>;
export type TitlePageConfig = NonNullable<LayoutConfig['titlePage']>;

/**
 * Layout configuration with defaults applied, the page size resolved to
 * points and the theme merged over the default one.
 */
export interface ResolvedLayoutConfig extends Omit<LayoutConfig, 'pageSize' | 'orientation' | 'theme' | 'margins'> {
  pageSize: Size;
  margins: Margin;
  theme: Theme;
}

// ============ Report data ============

export const sectionDataSchema = z.object({
  title: z.string(),
  blocks: z.array(blockEnvelopeSchema).default([])
});

export const reportDataSchema = z.object({
  config: layoutConfigSchema.innerType().partial().optional(),
  sections: z.array(sectionDataSchema)
});

export type ReportDataInput = z.input<typeof reportDataSchema>;

// ============ Helpers ============

/**
 * Flatten zod issues into "path: message" strings.
 */
export function formatIssues(error: ZodError, prefix: string = ''): string[] {
  return error.issues.map(issue => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse `value` or throw InvalidConfigurationError listing every issue.
 */
export function parseOrThrow<TOutput, TInput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  value: unknown,
  prefix?: string
): TOutput {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidConfigurationError(formatIssues(result.error, prefix));
  }
  return result.data;
}

/**
 * Validate layout options and apply defaults.
 * @throws InvalidConfigurationError
 */
export function resolveLayoutConfig(input: LayoutConfigInput = {}): ResolvedLayoutConfig {
  const config = parseOrThrow(layoutConfigSchema, input);
  const { pageSize, orientation, theme, ...rest } = config;
  const resolvedTheme = theme instanceof Theme ? theme : Theme.withOverrides(theme ?? {});

  const titleRoles = config.titlePage?.lines.map(line => line.role) ?? [];
  const missing = resolvedTheme.missingRoles(titleRoles);
  if (missing.length > 0) {
    throw new InvalidConfigurationError(missing.map(role => `titlePage: unknown theme role "${role}"`));
  }

  const decorationIssues = checkDecorations(config, resolvedTheme);
  if (decorationIssues.length > 0) {
    throw new InvalidConfigurationError(decorationIssues);
  }

  return {
    ...rest,
    pageSize: resolvePageSize(pageSize, orientation),
    theme: resolvedTheme
  };
}

/**
 * The footer has to sit inside the bottom margin and the continuation
 * header inside the top margin, or they would overlap content.
 */
function checkDecorations(config: LayoutConfig, theme: Theme): string[] {
  const issues: string[] = [];
  const { footerText, footerOffset, continuationText, continuationOffset, margins } = config;

  if (footerText) {
    const fontSize = theme.get('footer').fontSize;
    if (footerOffset + fontSize > margins.bottom) {
      issues.push(
        `footerOffset: Footer at ${footerOffset}pt with ${fontSize}pt text needs ` +
        `${footerOffset + fontSize}pt but the bottom margin is ${margins.bottom}pt`
      );
    }
  }
  if (continuationText && continuationOffset > margins.top) {
    issues.push(
      `continuationOffset: Continuation header ${continuationOffset}pt below the top edge ` +
      `falls outside the top margin of ${margins.top}pt`
    );
  }
  return issues;
}
