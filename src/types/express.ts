// Express Request interface augmentation

declare global {
  namespace Express {
    interface Request {
      correlationId: string;
    }
  }
}

export {};
