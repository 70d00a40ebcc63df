import express from "express";
import { createNetworkLogControllers } from "@controllers/network-log.controller";
import type { AuthMiddlewares } from "@middlewares/auth.middleware";
import type { AppContext } from "@services/app-context";

export const createNetworkLogRouter = (context: AppContext, { optionalAuthMiddleware }: AuthMiddlewares) => {
    const networkLogRouter = express.Router();
    const networkLogController = createNetworkLogControllers(context);

    networkLogRouter.post("/", optionalAuthMiddleware, networkLogController.createNetworkLogController);
    networkLogRouter.get("/", optionalAuthMiddleware, networkLogController.listNetworkLogsController);

    return networkLogRouter;
};
