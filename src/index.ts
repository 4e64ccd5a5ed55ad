export { compressTiff, decompressTiff } from './lib/compress.js';
export {
  ModelDetector,
  DETECT_TIMEOUT,
  type DetectionResult,
  type DetectorOptions,
} from './lib/detect.js';
export { CompressionMode, RowFrame, ROW_MARKER, emptyRow } from './lib/frame.js';
export { RasterImage, loadImage } from './lib/image.js';
export {
  Command,
  ControlCode,
  DEFAULT_MARGIN,
  PrintInfoFlag,
  renderJob,
  renderToBuffer,
  type RenderOptions,
} from './lib/job.js';
export {
  NetworkTransport,
  RAW_PRINT_PORT,
  type Transport,
} from './lib/network.js';
export {
  PrinterClient,
  type PrintOptions,
  type PrinterClientOptions,
} from './lib/printer.js';
export {
  DEFAULT_STRIPE_SIZE,
  PrinterModel,
  isPrinterModel,
  resolveStripeSize,
} from './lib/profile.js';
export {
  INK_THRESHOLD,
  luminance,
  rasterizeRow,
  type ImageSource,
  type Sample,
} from './lib/raster.js';
