import "@/types/express";
import { Request, Response } from "express";
import { asyncHandler } from "@/api/middleware/asyncHandler";
import { presentOrder } from "@/api/presenters";
import { sendData, sendNoContent, sendPage } from "@/api/responses";
import { idParamSchema } from "@/api/validation/common";
import {
  createOrderSchema,
  customerIdParamSchema,
  orderListQuerySchema,
  orderNumberParamSchema,
  recentOrdersQuerySchema,
  revenueQuerySchema,
} from "@/api/validation/orderValidation";
import { createContextLogger } from "@/monitoring/logger";
import { orderService } from "@/services/orderService";
import { statisticsService } from "@/services/statisticsService";

export const createOrder = asyncHandler(async (req: Request, res: Response) => {
  const correlationId = req.correlationId;
  const contextLogger = createContextLogger(correlationId);

  // Validate request body
  const validatedData = createOrderSchema.parse(req.body);

  contextLogger.info("Creating order", {
    customerId: validatedData.customerId,
    itemCount: validatedData.items.length,
  });

  const order = await orderService.createOrder(validatedData, correlationId);

  contextLogger.info("Order created successfully", {
    orderId: order.id,
    orderNumber: order.orderNumber,
  });

  sendData(req, res, presentOrder(order), 201);
});

export const listOrders = asyncHandler(async (req: Request, res: Response) => {
  const query = orderListQuerySchema.parse(req.query);
  const page = await orderService.listOrders(query);
  sendPage(req, res, page, presentOrder);
});

export const getOrder = asyncHandler(async (req: Request, res: Response) => {
  const { id } = idParamSchema.parse(req.params);
  sendData(req, res, presentOrder(await orderService.getOrder(id)));
});

export const getOrderByNumber = asyncHandler(
  async (req: Request, res: Response) => {
    const { orderNumber } = orderNumberParamSchema.parse(req.params);
    const order = await orderService.getOrderByNumber(orderNumber);
    sendData(req, res, presentOrder(order));
  }
);

export const listOrdersByCustomer = asyncHandler(
  async (req: Request, res: Response) => {
    const { customerId } = customerIdParamSchema.parse(req.params);
    const orders = await orderService.listOrdersByCustomer(customerId);
    sendData(req, res, orders.map(presentOrder));
  }
);

export const listRecentOrders = asyncHandler(
  async (req: Request, res: Response) => {
    const { days } = recentOrdersQuerySchema.parse(req.query);
    const orders = await orderService.listRecentOrders(days);
    sendData(req, res, orders.map(presentOrder));
  }
);

export const getOrderStatistics = asyncHandler(
  async (req: Request, res: Response) => {
    sendData(req, res, await statisticsService.getOrderStatistics());
  }
);

export const getRevenueByPeriod = asyncHandler(
  async (req: Request, res: Response) => {
    const query = revenueQuerySchema.parse(req.query);
    sendData(req, res, await statisticsService.getRevenueByPeriod(query));
  }
);

export const deleteOrder = asyncHandler(async (req: Request, res: Response) => {
  const { id } = idParamSchema.parse(req.params);
  await orderService.deleteOrder(id, req.correlationId);
  sendNoContent(res);
});
