import { Router } from "express";
import {
  createOrder,
  deleteOrder,
  getOrder,
  getOrderByNumber,
  getOrderStatistics,
  getRevenueByPeriod,
  listOrders,
  listOrdersByCustomer,
  listRecentOrders,
} from "@/api/controllers/orderController";

const router: Router = Router();

// GET /api/orders - Paginated, filtered listing
router.get("/", listOrders);
router.get("/recent", listRecentOrders);
router.get("/statistics", getOrderStatistics);
router.get("/revenue-by-period", getRevenueByPeriod);
router.get("/number/:orderNumber", getOrderByNumber);
router.get("/customer/:customerId", listOrdersByCustomer);
router.get("/:id", getOrder);

// POST /api/orders - Create order with its items
router.post("/", createOrder);
router.delete("/:id", deleteOrder);

export { router as orderRoutes };
