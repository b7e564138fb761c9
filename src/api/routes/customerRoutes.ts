import { Router } from "express";
import {
  createCustomer,
  deleteCustomer,
  getCustomer,
  getCustomerOrders,
  getCustomerStatistics,
  listCustomerCities,
  listCustomerCountries,
  listCustomers,
  updateCustomer,
} from "@/api/controllers/customerController";

const router: Router = Router();

// Fixed paths before /:id
router.get("/", listCustomers);
router.get("/countries", listCustomerCountries);
router.get("/cities", listCustomerCities);
router.get("/statistics", getCustomerStatistics);
router.get("/:id", getCustomer);
router.get("/:id/orders", getCustomerOrders);
router.post("/", createCustomer);
router.put("/:id", updateCustomer);
router.delete("/:id", deleteCustomer);

export { router as customerRoutes };
