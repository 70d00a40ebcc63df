import type { StorageMode } from "@services/storage/storage.types";

export type ServiceResponse<T> = {
    status: boolean;
    code: number;
    message: string;
    data: T | null;
    /** Present on telemetry responses so degraded-mode answers are explicit. */
    storage?: StorageMode;
}
