import "@/types/express";
import type { Request, Response } from "express";
import type { Page } from "@/types";

export const PAGINATION_HEADERS = {
  totalCount: "X-Total-Count",
  page: "X-Page",
  pageSize: "X-Page-Size",
  totalPages: "X-Total-Pages",
} as const;

export const sendData = <T>(
  req: Request,
  res: Response,
  data: T,
  statusCode = 200
) => {
  res.status(statusCode).json({
    success: true,
    data,
    correlationId: req.correlationId,
  });
};

/** Page metadata travels in headers; the body carries only the items. */
export const sendPage = <T, TView>(
  req: Request,
  res: Response,
  page: Page<T>,
  present: (item: T) => TView
) => {
  res.setHeader(PAGINATION_HEADERS.totalCount, String(page.meta.totalCount));
  res.setHeader(PAGINATION_HEADERS.page, String(page.meta.page));
  res.setHeader(PAGINATION_HEADERS.pageSize, String(page.meta.pageSize));
  res.setHeader(PAGINATION_HEADERS.totalPages, String(page.meta.totalPages));
  sendData(req, res, page.items.map(present));
};

export const sendNoContent = (res: Response) => {
  res.status(204).end();
};
