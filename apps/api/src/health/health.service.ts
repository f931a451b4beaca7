import { Injectable } from '@nestjs/common';
import { SERVICE_NAME } from '../common/constants';
import type { HealthResponseModel } from './models/health-response.model';

@Injectable()
export class HealthService {
  getHealth(): HealthResponseModel {
    return {
      status: 'OK',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
    };
  }
}
