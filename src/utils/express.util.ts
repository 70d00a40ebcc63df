// utils/express.util.ts

import type { Response } from 'express';
import type { ServiceResponse } from 'types/service.types';

export const sendResponse = <T>(res: Response, response: ServiceResponse<T>): void => {
    res.status(response.code).json({
        status: response.status,
        message: response.message,
        data: response.data,
        ...(response.storage && { storage: response.storage }),
    });
};
