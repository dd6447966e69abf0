export {
  LayoutError,
  BlockTooLargeError,
  CanvasIOError,
  InvalidConfigurationError
} from './LayoutError';
