import { Router } from "express";
import { customerRoutes } from "./customerRoutes";
import { supplierRoutes } from "./supplierRoutes";
import { productRoutes } from "./productRoutes";
import { orderRoutes } from "./orderRoutes";
import { orderItemRoutes } from "./orderItemRoutes";

const router: Router = Router();

// Mount route modules
router.use("/customers", customerRoutes);
router.use("/suppliers", supplierRoutes);
router.use("/products", productRoutes);
router.use("/orders", orderRoutes);
router.use("/order-items", orderItemRoutes);

export { router as apiRoutes };
