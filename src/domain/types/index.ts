/**
 * Domain Types - Unified exports
 */

export { Success, Failure, isOk, isFail } from './result';
export type { Result, ErrorKind, ErrorReport } from './result';

export type {
  ImageSource,
  ImageEncoding,
  ColorMode,
  Orientation,
  DecodedImage,
  RgbTuple,
  DominantColor,
  ColorReport,
  OrientationReport,
  ContrastLevel,
  TextLikelihood,
  TextInfoReport,
  ImageAnalysisReport,
} from './image';
