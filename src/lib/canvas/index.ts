export { BaseCanvas } from './PageCanvas';
export type { PageCanvas, ImageSource, TextOptions, LineOptions, RectOptions } from './PageCanvas';
export { RecordingCanvas, textOps } from './RecordingCanvas';
export type { DrawOp, RecordedPage, RecordedDocument } from './RecordingCanvas';
export { PdfCanvas } from './PdfCanvas';
export type { PdfCanvasOptions, PdfArtifact } from './PdfCanvas';
export { loadImage, loadImages, detectImageFormat, describeImageSource } from './ImageLoader';
export type { LoadedImage, ImageFormat } from './ImageLoader';
export { getStandardFont, filterToWinAnsi, toPdfColor, alignedX } from './pdf-utils';
