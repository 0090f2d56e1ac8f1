declare global {
  namespace Express {
    interface Request {
      /**
       * Correlation id from `x-request-id` or generated per request.
       */
      id?: string;
    }
  }
}

export {};
