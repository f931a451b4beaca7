import { Controller, Get } from '@nestjs/common';
import { GreetingService } from './greeting.service';
import type { GreetingResponseModel } from './models/greeting-response.model';

@Controller()
export class GreetingController {
  constructor(private readonly greetingService: GreetingService) {}

  @Get()
  getGreeting(): GreetingResponseModel {
    return this.greetingService.getGreeting();
  }
}
