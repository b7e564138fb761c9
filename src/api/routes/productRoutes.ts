import { Router } from "express";
import {
  createProduct,
  deleteProduct,
  discontinueProduct,
  getProduct,
  getProductStatistics,
  listActiveProducts,
  listDiscontinuedProducts,
  listProducts,
  listProductsBySupplier,
  reactivateProduct,
  searchProducts,
  updateProduct,
  updateProductPrice,
} from "@/api/controllers/productController";

const router: Router = Router();

router.get("/", listProducts);
router.get("/active", listActiveProducts);
router.get("/discontinued", listDiscontinuedProducts);
router.get("/statistics", getProductStatistics);
router.get("/search/:term", searchProducts);
router.get("/supplier/:supplierId", listProductsBySupplier);
router.get("/:id", getProduct);
router.post("/", createProduct);
router.put("/:id", updateProduct);
router.patch("/:id/price", updateProductPrice);
router.patch("/:id/discontinue", discontinueProduct);
router.patch("/:id/reactivate", reactivateProduct);
router.delete("/:id", deleteProduct);

export { router as productRoutes };
