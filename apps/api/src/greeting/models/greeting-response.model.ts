import type { GreetingResponse } from '@k8s-hands-on/shared';

export const GREETING_MESSAGE = 'Hola mundo';

export class GreetingResponseModel implements GreetingResponse {
  message!: string;
  timestamp!: string;
  service!: string;
  hostname!: string;
}
