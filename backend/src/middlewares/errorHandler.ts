import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

export const errorMessages: Record<number, string> = {
  400: 'Bad Request',
  404: 'Resource Not Found',
  405: 'Method Not Allowed',
  422: 'Unprocessable',
  500: 'Internal Server Error',
};

export class ApiError extends Error {
  statusCode: number;

  constructor(statusCode: number, message: string = errorMessages[statusCode] ?? 'Error') {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

// Raised by a repository when the store refuses a well-formed write.
export class StoreRejectedError extends ApiError {
  constructor(message: string = errorMessages[422]) {
    super(422, message);
    this.name = 'StoreRejectedError';
  }
}

export interface ErrorBody {
  success: false;
  error: number;
  message: string;
}

const isBodyParserError = (error: unknown): error is SyntaxError & { type: string } =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

export const formatZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(new ApiError(404));
};

export const methodNotAllowed = (_req: Request, _res: Response, next: NextFunction) => {
  next(new ApiError(405));
};

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
  let statusCode = 500;
  let message = errorMessages[500];

  if (error instanceof ApiError) {
    statusCode = error.statusCode;
    message = error.message;
  } else if (error instanceof ZodError) {
    statusCode = 400;
    message = formatZodError(error);
  } else if (isBodyParserError(error)) {
    statusCode = 400;
    message = 'Malformed JSON body';
  }

  if (statusCode >= 500) {
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
  }

  const body: ErrorBody = { success: false, error: statusCode, message };
  res.status(statusCode).json(body);
};
