export {
  OutputCapture,
  type CaptureHandle,
  type CaptureSnapshot,
  type Channel,
  type OutputCaptureOptions,
  type WritableChannel,
} from './outputCapture';
