import { v4 as uuidv4 } from 'uuid';

export type RequestOrigin = 'http' | 'batch' | 'direct';

/** Ids look like `http-<uuid>` so log lines show where a verification came from. */
export function createRequestId(origin: RequestOrigin): string {
  return `${origin}-${uuidv4()}`;
}
