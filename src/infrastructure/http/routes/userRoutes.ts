import { Router } from "express";
import { RegistrationController } from "../controllers/RegistrationController";

export const createUserRouter = (controller: RegistrationController): Router => {
  const userRouter = Router();

  userRouter.post("/register", controller.register.bind(controller));

  return userRouter;
};
