import { healthController } from "@interfaces/http/HealthController";
import { Router } from "express";

const router = Router();

router.get("/", healthController);

export default router;
