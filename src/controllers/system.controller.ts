import type { RequestHandler } from "express";
import type { AppContext } from "@services/app-context";
import { HealthService } from "@services/health.service";

// ✅ Service banner
export const createRootController = ({ keys, gateway }: AppContext): RequestHandler =>
    (_req, res, next) => {
        try {
            res.status(200).json({
                status: true,
                message: "QoE Boost API is running",
                data: {
                    version: keys.APILiveVersion,
                    environment: keys.nodeEnv,
                    storage: gateway.mode,
                },
            });
        } catch (err) {
            next(err);
        }
    };

// ✅ Health check, including the storage backend
export const createHealthController = ({ gateway }: AppContext): RequestHandler =>
    async (_req, res, next) => {
        try {
            const health = await HealthService.getHealthStatus(gateway);
            res.status(health.status === "unhealthy" ? 503 : 200).json(health);
        } catch (err) {
            next(err);
        }
    };
