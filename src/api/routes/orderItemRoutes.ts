import { Router } from "express";
import {
  deleteOrderItem,
  getOrderItem,
  getOrderItemStatistics,
  getProductSales,
  listOrderItems,
  updateOrderItem,
} from "@/api/controllers/orderItemController";

const router: Router = Router();

router.get("/statistics", getOrderItemStatistics);
router.get("/order/:orderId", listOrderItems);
router.get("/product/:productId/sales", getProductSales);
router.get("/:id", getOrderItem);
router.put("/:id", updateOrderItem);
router.delete("/:id", deleteOrderItem);

export { router as orderItemRoutes };
