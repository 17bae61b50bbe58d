import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * A tenant configuration document (or the environment) could not be read as a whole.
 * Fatal at start-up; entry-level problems are skipped by the loader instead.
 */
export class ConfigurationError extends Error implements AppError {
  statusCode = 500;
  isOperational = false;
  source: string;
  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "ConfigurationError";
    this.source = source;
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

/** No credential, network/auth failure, timeout or non-2xx from the text-generation backend. */
export class BackendUnavailableError extends ExternalServiceError {
  code = "backend_unavailable";
  constructor(message: string) {
    super("Text generation", message);
    this.name = "BackendUnavailableError";
  }
}

/** The backend answered, but not with the JSON the classifier asked for. */
export class MalformedBackendReplyError extends ExternalServiceError {
  code = "malformed_backend_reply";
  constructor(message: string) {
    super("Text generation", message);
    this.name = "MalformedBackendReplyError";
  }
}

export type BackendError = BackendUnavailableError | MalformedBackendReplyError;

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

/**
 * Terminal Express error handler. Errors passed to next() by the validation
 * middleware and route handlers end up here.
 */
export function errorMiddleware(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  handleRouteError(res, error, "HTTP");
}
