import { SecurityType } from '../rfb/constants.js';
import type { ProtocolVersion } from '../rfb/types.js';

export interface SecurityContext {
  version: ProtocolVersion;
  read(size: number): Promise<Uint8Array>;
  write(bytes: Uint8Array): Promise<void>;
}

/**
 * Plug-in point for RFB security types. A handler runs its exchange after
 * the type is chosen and before SecurityResult is read.
 */
export interface SecurityHandler {
  readonly type: number;
  readonly name: string;
  authenticate(ctx: SecurityContext): Promise<void>;
}

export const noneSecurity: SecurityHandler = {
  type: SecurityType.None,
  name: 'None',
  authenticate: () => Promise.resolve(),
};
