import "@/types/express";
import { Request, Response } from "express";
import { asyncHandler } from "@/api/middleware/asyncHandler";
import { presentCustomer, presentOrder } from "@/api/presenters";
import { sendData, sendNoContent, sendPage } from "@/api/responses";
import { countryQuerySchema, idParamSchema } from "@/api/validation/common";
import {
  customerListQuerySchema,
  customerSchema,
} from "@/api/validation/customerValidation";
import { createContextLogger } from "@/monitoring/logger";
import { customerService } from "@/services/customerService";
import { orderService } from "@/services/orderService";
import { statisticsService } from "@/services/statisticsService";

export const listCustomers = asyncHandler(async (req: Request, res: Response) => {
  const query = customerListQuerySchema.parse(req.query);
  const page = await customerService.listCustomers(query);
  sendPage(req, res, page, presentCustomer);
});

export const getCustomer = asyncHandler(async (req: Request, res: Response) => {
  const { id } = idParamSchema.parse(req.params);
  const customer = await customerService.getCustomer(id);
  sendData(req, res, presentCustomer(customer));
});

export const getCustomerOrders = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const orders = await orderService.listOrdersByCustomer(id);
    sendData(req, res, orders.map(presentOrder));
  }
);

export const listCustomerCountries = asyncHandler(
  async (req: Request, res: Response) => {
    sendData(req, res, await customerService.listCountries());
  }
);

export const listCustomerCities = asyncHandler(
  async (req: Request, res: Response) => {
    const { country } = countryQuerySchema.parse(req.query);
    sendData(req, res, await customerService.listCities(country));
  }
);

export const getCustomerStatistics = asyncHandler(
  async (req: Request, res: Response) => {
    sendData(req, res, await statisticsService.getCustomerStatistics());
  }
);

export const createCustomer = asyncHandler(
  async (req: Request, res: Response) => {
    const contextLogger = createContextLogger(req.correlationId);
    const body = customerSchema.parse(req.body);

    contextLogger.info("Creating customer", { lastName: body.lastName });

    const customer = await customerService.createCustomer(
      body,
      req.correlationId
    );
    sendData(req, res, presentCustomer(customer), 201);
  }
);

export const updateCustomer = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const body = customerSchema.parse(req.body);
    const customer = await customerService.updateCustomer(
      id,
      body,
      req.correlationId
    );
    sendData(req, res, presentCustomer(customer));
  }
);

export const deleteCustomer = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    await customerService.deleteCustomer(id, req.correlationId);
    sendNoContent(res);
  }
);
