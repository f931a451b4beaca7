export interface GreetingResponse {
  message: string;
  timestamp: string;
  service: string;
  hostname: string;
}

export interface HealthResponse {
  status: 'OK';
  service: string;
  timestamp: string;
}

/** Body for routing misses and other client-side HTTP errors. */
export interface PathErrorResponse {
  error: string;
  path: string;
}

/** Body for failures raised while a handler was producing a response. */
export interface InternalErrorResponse {
  error: string;
  message: string;
}

export type ErrorResponse = PathErrorResponse | InternalErrorResponse;
