import type { HealthResponse } from '@k8s-hands-on/shared';

export class HealthResponseModel implements HealthResponse {
  status!: 'OK';
  service!: string;
  timestamp!: string;
}
