import express from "express";
import { createHealthController, createRootController } from "@controllers/system.controller";
import type { AppContext } from "@services/app-context";

export const createSystemRouter = (context: AppContext) => {
    const systemRouter = express.Router();

    systemRouter.get("/", createRootController(context));
    systemRouter.get("/health", createHealthController(context));

    return systemRouter;
};
