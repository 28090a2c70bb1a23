import express from "express";
import { handleExtract } from "../controllers/extract.controller";
import { requireApiKey } from "../middleware/auth.middleware";

const router = express.Router();

router.post("/extract", requireApiKey, handleExtract);

export default router;
