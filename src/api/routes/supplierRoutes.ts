import { Router } from "express";
import {
  createSupplier,
  deleteSupplier,
  getSupplier,
  getSupplierActiveProducts,
  getSupplierPerformance,
  getSupplierProducts,
  getSupplierStatistics,
  listSupplierCities,
  listSupplierCountries,
  listSuppliers,
  searchSuppliers,
  updateSupplier,
} from "@/api/controllers/supplierController";

const router: Router = Router();

router.get("/", listSuppliers);
router.get("/countries", listSupplierCountries);
router.get("/cities", listSupplierCities);
router.get("/statistics", getSupplierStatistics);
router.get("/search/:term", searchSuppliers);
router.get("/:id", getSupplier);
router.get("/:id/products", getSupplierProducts);
router.get("/:id/products/active", getSupplierActiveProducts);
router.get("/:id/performance", getSupplierPerformance);
router.post("/", createSupplier);
router.put("/:id", updateSupplier);
router.delete("/:id", deleteSupplier);

export { router as supplierRoutes };
