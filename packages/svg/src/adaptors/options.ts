import type { Logger } from '@scenesync/core';

export interface SvgAdaptorOptions {
  logger: Logger;
  /** Decimals kept when numbers are written into markup. */
  precision: number;
}
