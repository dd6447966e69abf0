export {
  layoutConfigSchema,
  reportDataSchema,
  sectionDataSchema,
  blockEnvelopeSchema,
  styleInitSchema,
  colorSchema,
  resolveLayoutConfig,
  parseOrThrow,
  formatIssues
} from './schema';
export type {
  LayoutConfigInput,
  LayoutConfig,
  ResolvedLayoutConfig,
  TitlePageConfig,
  ReportDataInput
} from './schema';
