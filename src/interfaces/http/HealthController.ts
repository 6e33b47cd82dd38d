import { ENGINE_NAME } from "@config/index";
import { Request, Response } from "express";

export function healthController(_req: Request, res: Response): void {
  res.json({ status: "ok", engine: ENGINE_NAME });
}
