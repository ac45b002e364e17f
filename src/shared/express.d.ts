/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * Adds requestStartTime, written by the requestTimer middleware and read by
 * RunController when it reports meta.totalTimeMs.
 */
declare global {
  namespace Express {
    interface Request {
      /** Epoch milliseconds at which the request entered the pipeline. */
      requestStartTime?: number;
    }
  }
}

export {};
