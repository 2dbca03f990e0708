import { Router } from "express";
import { UploadUrlController } from "../controllers/UploadUrlController";

export const createUploadUrlRouter = (controller: UploadUrlController): Router => {
  const uploadUrlRouter = Router();

  uploadUrlRouter.post("/presigned-urls", controller.create.bind(controller));

  return uploadUrlRouter;
};
