/**
 * AutoApproveProvider: approves every confirmation. Used for `--yes`.
 * Deny verdicts never reach a provider's confirm(), so they still apply.
 */

import type { ConfirmationProvider, ConfirmRequest } from '../types.js';

export class AutoApproveProvider implements ConfirmationProvider {
  async confirm(_opts: ConfirmRequest): Promise<boolean> {
    return true;
  }
}
