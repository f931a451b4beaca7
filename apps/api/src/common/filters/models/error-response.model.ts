import type { InternalErrorResponse, PathErrorResponse } from '@k8s-hands-on/shared';

export const NOT_FOUND_ERROR = 'Ruta no encontrada';
export const INTERNAL_ERROR = 'Error interno del servidor';

export class PathErrorResponseModel implements PathErrorResponse {
  error!: string;
  path!: string;
}

export class InternalErrorResponseModel implements InternalErrorResponse {
  error!: string;
  message!: string;
}
