import { CloudflareApiError, type CloudflareErrorItem } from "./cloudflare/client";

const MAX_LOGGED_BODY_LENGTH = 1024;

export type ErrorDescription = {
  readonly error: string;
  readonly errorName?: string;
  readonly status?: number;
  readonly apiErrors?: readonly CloudflareErrorItem[];
  readonly responseBody?: string;
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const describeError = (error: unknown): ErrorDescription => {
  const base: ErrorDescription = {
    error: errorMessage(error),
    errorName: error instanceof Error ? error.name : undefined
  };
  if (!(error instanceof CloudflareApiError)) {
    return base;
  }
  return {
    ...base,
    status: error.status,
    apiErrors: error.errors,
    responseBody: error.body?.slice(0, MAX_LOGGED_BODY_LENGTH)
  };
};
