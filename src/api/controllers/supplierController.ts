import "@/types/express";
import { Request, Response } from "express";
import { asyncHandler } from "@/api/middleware/asyncHandler";
import { presentProduct, presentSupplier } from "@/api/presenters";
import { sendData, sendNoContent, sendPage } from "@/api/responses";
import {
  countryQuerySchema,
  idParamSchema,
  searchTermParamSchema,
} from "@/api/validation/common";
import {
  supplierListQuerySchema,
  supplierSchema,
} from "@/api/validation/supplierValidation";
import { createContextLogger } from "@/monitoring/logger";
import { productService } from "@/services/productService";
import { statisticsService } from "@/services/statisticsService";
import { supplierService } from "@/services/supplierService";

export const listSuppliers = asyncHandler(async (req: Request, res: Response) => {
  const query = supplierListQuerySchema.parse(req.query);
  const page = await supplierService.listSuppliers(query);
  sendPage(req, res, page, presentSupplier);
});

export const getSupplier = asyncHandler(async (req: Request, res: Response) => {
  const { id } = idParamSchema.parse(req.params);
  sendData(req, res, presentSupplier(await supplierService.getSupplier(id)));
});

export const getSupplierProducts = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const products = await productService.listProductsBySupplier(id);
    sendData(req, res, products.map(presentProduct));
  }
);

export const getSupplierActiveProducts = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const supplier = await supplierService.getSupplier(id);
    const products = await supplierService.getSupplierProducts(id, true);
    sendData(
      req,
      res,
      products.map((product) => presentProduct({ ...product, supplier }))
    );
  }
);

export const searchSuppliers = asyncHandler(
  async (req: Request, res: Response) => {
    const { term } = searchTermParamSchema.parse(req.params);
    const suppliers = await supplierService.searchSuppliers(term);
    sendData(req, res, suppliers.map(presentSupplier));
  }
);

export const listSupplierCountries = asyncHandler(
  async (req: Request, res: Response) => {
    sendData(req, res, await supplierService.listCountries());
  }
);

export const listSupplierCities = asyncHandler(
  async (req: Request, res: Response) => {
    const { country } = countryQuerySchema.parse(req.query);
    sendData(req, res, await supplierService.listCities(country));
  }
);

export const getSupplierStatistics = asyncHandler(
  async (req: Request, res: Response) => {
    sendData(req, res, await statisticsService.getSupplierStatistics());
  }
);

export const getSupplierPerformance = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    sendData(req, res, await statisticsService.getSupplierPerformance(id));
  }
);

export const createSupplier = asyncHandler(
  async (req: Request, res: Response) => {
    const contextLogger = createContextLogger(req.correlationId);
    const body = supplierSchema.parse(req.body);

    contextLogger.info("Creating supplier", { companyName: body.companyName });

    const supplier = await supplierService.createSupplier(
      body,
      req.correlationId
    );
    sendData(req, res, presentSupplier(supplier), 201);
  }
);

export const updateSupplier = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const body = supplierSchema.parse(req.body);
    const supplier = await supplierService.updateSupplier(
      id,
      body,
      req.correlationId
    );
    sendData(req, res, presentSupplier(supplier));
  }
);

export const deleteSupplier = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    await supplierService.deleteSupplier(id, req.correlationId);
    sendNoContent(res);
  }
);
