// Request augmentation, loaded by the middleware that fills it in
export {};

declare global {
  namespace Express {
    interface RequestMetrics {
      startTime: number;
      requestId: string;
    }

    interface Request {
      metrics?: RequestMetrics;
    }
  }
}
