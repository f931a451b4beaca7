import { Injectable } from '@nestjs/common';
import { hostname } from 'os';
import { SERVICE_NAME } from '../common/constants';
import { GREETING_MESSAGE } from './models/greeting-response.model';
import type { GreetingResponseModel } from './models/greeting-response.model';

@Injectable()
export class GreetingService {
  /** The hostname is read on every call so each pod replica reports its own name. */
  getGreeting(): GreetingResponseModel {
    return {
      message: GREETING_MESSAGE,
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      hostname: hostname(),
    };
  }
}
