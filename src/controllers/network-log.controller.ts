import type { RequestHandler } from "express";
import { z } from "zod";
import type { AppContext } from "@services/app-context";
import { sendResponse } from "@utils/express.util";
import { pageQuerySchema } from "@utils/pagination.util";
import { submitterOf, telemetryHandler } from "./telemetry.controller";

export const networkLogSchema = z.object({
    location: z.string().trim().min(1, "Location is required").max(200),
    provider: z.string().trim().min(1, "Provider is required").max(100),
    quality_score: z.number().min(0).max(100),
    latency_ms: z.number().nonnegative(),
    download_mbps: z.number().nonnegative(),
    upload_mbps: z.number().nonnegative().optional(),
    signal_strength_dbm: z.number().min(-200).max(0).optional(),
}).strict();

export interface NetworkLogControllers {
    createNetworkLogController: RequestHandler;
    listNetworkLogsController: RequestHandler;
}

export const createNetworkLogControllers = ({ telemetry }: AppContext): NetworkLogControllers => ({
    createNetworkLogController: telemetryHandler(async (req, res) => {
        const { upload_mbps, signal_strength_dbm, ...metrics } = networkLogSchema.parse(req.body);
        const log = await telemetry.submitNetworkLog(submitterOf(req), {
            ...metrics,
            upload_mbps: upload_mbps ?? null,
            signal_strength_dbm: signal_strength_dbm ?? null,
        });

        sendResponse(res, {
            status: true,
            code: 201,
            message: "Network log recorded successfully",
            data: log,
            storage: telemetry.storage,
        });
    }),

    listNetworkLogsController: telemetryHandler(async (req, res) => {
        const page = pageQuerySchema.parse(req.query);
        const logs = await telemetry.listNetworkLogs(submitterOf(req), page);

        sendResponse(res, {
            status: true,
            code: 200,
            message: "Network logs retrieved successfully",
            data: logs,
            storage: telemetry.storage,
        });
    }),
});
