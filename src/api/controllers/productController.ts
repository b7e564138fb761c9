import "@/types/express";
import { Request, Response } from "express";
import { asyncHandler } from "@/api/middleware/asyncHandler";
import { presentProduct } from "@/api/presenters";
import { sendData, sendNoContent, sendPage } from "@/api/responses";
import { idParamSchema, searchTermParamSchema } from "@/api/validation/common";
import {
  productListQuerySchema,
  productPriceSchema,
  productSchema,
  supplierIdParamSchema,
} from "@/api/validation/productValidation";
import { createContextLogger } from "@/monitoring/logger";
import { productService } from "@/services/productService";
import { statisticsService } from "@/services/statisticsService";

export const listProducts = asyncHandler(async (req: Request, res: Response) => {
  const query = productListQuerySchema.parse(req.query);
  const page = await productService.listProducts(query);
  sendPage(req, res, page, presentProduct);
});

export const getProduct = asyncHandler(async (req: Request, res: Response) => {
  const { id } = idParamSchema.parse(req.params);
  sendData(req, res, presentProduct(await productService.getProduct(id)));
});

export const listActiveProducts = asyncHandler(
  async (req: Request, res: Response) => {
    const products = await productService.listActiveProducts();
    sendData(req, res, products.map(presentProduct));
  }
);

export const listDiscontinuedProducts = asyncHandler(
  async (req: Request, res: Response) => {
    const products = await productService.listDiscontinuedProducts();
    sendData(req, res, products.map(presentProduct));
  }
);

export const listProductsBySupplier = asyncHandler(
  async (req: Request, res: Response) => {
    const { supplierId } = supplierIdParamSchema.parse(req.params);
    const products = await productService.listProductsBySupplier(supplierId);
    sendData(req, res, products.map(presentProduct));
  }
);

export const searchProducts = asyncHandler(
  async (req: Request, res: Response) => {
    const { term } = searchTermParamSchema.parse(req.params);
    const products = await productService.searchProducts(term);
    sendData(req, res, products.map(presentProduct));
  }
);

export const getProductStatistics = asyncHandler(
  async (req: Request, res: Response) => {
    sendData(req, res, await statisticsService.getProductStatistics());
  }
);

export const createProduct = asyncHandler(
  async (req: Request, res: Response) => {
    const contextLogger = createContextLogger(req.correlationId);
    const body = productSchema.parse(req.body);

    contextLogger.info("Creating product", {
      productName: body.productName,
      supplierId: body.supplierId,
    });

    const product = await productService.createProduct(body, req.correlationId);
    sendData(req, res, presentProduct(product), 201);
  }
);

export const updateProduct = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const body = productSchema.parse(req.body);
    const product = await productService.updateProduct(
      id,
      body,
      req.correlationId
    );
    sendData(req, res, presentProduct(product));
  }
);

export const updateProductPrice = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    const { unitPrice } = productPriceSchema.parse(req.body);
    const product = await productService.updateProductPrice(
      id,
      unitPrice,
      req.correlationId
    );
    sendData(req, res, presentProduct(product));
  }
);

export const discontinueProduct = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    await productService.discontinueProduct(id, req.correlationId);
    sendNoContent(res);
  }
);

export const reactivateProduct = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    await productService.reactivateProduct(id, req.correlationId);
    sendNoContent(res);
  }
);

export const deleteProduct = asyncHandler(
  async (req: Request, res: Response) => {
    const { id } = idParamSchema.parse(req.params);
    await productService.deleteProduct(id, req.correlationId);
    sendNoContent(res);
  }
);
