import "@/types/express";
import { Request, Response } from "express";
import { asyncHandler } from "@/api/middleware/asyncHandler";
import { presentOrderItem } from "@/api/presenters";
import { sendData, sendNoContent } from "@/api/responses";
import { idParamSchema } from "@/api/validation/common";
import {
  orderIdParamSchema,
  productIdParamSchema,
  productSalesQuerySchema,
  updateOrderItemSchema,
} from "@/api/validation/orderItemValidation";
import { orderItemService } from "@/services/orderItemService";
import { statisticsService } from "@/services/statisticsService";

export const getOrderItem = asyncHandler(async (req: Request, res: Response) => {
  const { id } = idParamSchema.parse(req.params);
  sendData(req, res, presentOrderItem(await orderItemService.getOrderItem(id)));
});

export const listOrderItems = asyncHandler(
  async (req: Request, res: Response) => {
    const { orderId } = orderIdParamSchema.parse(req.params);
    const items = await orderItemService.listOrderItems(orderId);
    sendData(req, res, items.map(presentOrderItem));
  }
);

export const updateOrderItem = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const { quantity } = updateOrderItemSchema.parse(req.body);
    const item = await orderItemService.updateQuantity(
      id,
      quantity,
      req.correlationId
    );
    sendData(req, res, presentOrderItem(item));
  }
);

export const deleteOrderItem = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    await orderItemService.deleteItem(id, req.correlationId);
    sendNoContent(res);
  }
);

export const getOrderItemStatistics = asyncHandler(
  async (req: Request, res: Response) => {
    sendData(req, res, await statisticsService.getOrderItemStatistics());
  }
);

export const getProductSales = asyncHandler(
  async (req: Request, res: Response) => {
    const { productId } = productIdParamSchema.parse(req.params);
    const { fromDate, toDate } = productSalesQuerySchema.parse(req.query);
    sendData(
      req,
      res,
      await statisticsService.getProductSales(productId, fromDate, toDate)
    );
  }
);
