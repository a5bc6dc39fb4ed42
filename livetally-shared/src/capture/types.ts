export type CaptureFormat = 'jpg' | 'png';

export const CAPTURE_FORMATS: readonly CaptureFormat[] = ['jpg', 'png'];

/** A frame written to disk. */
export interface CaptureReference {
  path: string;
  /** Epoch ms when the capture was started. */
  createdAt: number;
}

/** Where a finished capture is published. Implemented by the session state. */
export interface CaptureTarget {
  recordCapture(reference: CaptureReference): void;
  setThumbnail(base64: string | null): void;
}

export type CaptureOutcome =
  | { status: 'captured'; reference: CaptureReference; thumbnail: boolean }
  | { status: 'skipped' }
  | { status: 'timeout' }
  | { status: 'failed'; exitCode: number | null; message: string };
