import "@/types/express";
import { Request, Response, NextFunction } from "express";
import { generateCorrelationId } from "@/utils/idGenerator";

export const CORRELATION_ID_HEADER = "x-correlation-id";

export const correlationIdMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const incoming = req.header(CORRELATION_ID_HEADER)?.trim();
  req.correlationId = incoming || generateCorrelationId();
  res.setHeader(CORRELATION_ID_HEADER, req.correlationId);
  next();
};
