import type { IncomingHttpHeaders } from 'http';
import { v4 as uuidv4 } from 'uuid';

/** Reuses the client's correlation id when it sent one, otherwise mints a UUID v4. */
export function resolveCorrelationId(headers: IncomingHttpHeaders, headerName: string): string {
  const value = headers[headerName.toLowerCase()];
  const incoming = Array.isArray(value) ? value[0] : value;
  return incoming !== undefined && incoming !== '' ? incoming : uuidv4();
}
