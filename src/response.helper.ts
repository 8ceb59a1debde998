import { Injectable } from '@nestjs/common';

export interface StandardResponse<T = unknown> {
  statusCode: number;
  message: string;
  data?: T;
  error?: unknown;
}

@Injectable()
export class ResponseHelper {
  success<T>(data: T, message = 'Success', statusCode = 200): StandardResponse<T> {
    return { statusCode, message, data };
  }
}
