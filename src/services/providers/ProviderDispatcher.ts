/**
 * Provider Dispatcher
 *
 * Typed front door for callers: look up the active provider for a contract
 * and call it, without knowing which implementation currently serves it.
 */

import type { ProviderRouter } from './ProviderRouter.js';
import type { BaseProvider } from './BaseProvider.js';
import { implementsContract } from './CapabilityInspector.js';
import type { CapabilityContract } from '../../types/providers/index.js';
import { ProviderUnavailableError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';

export class ProviderDispatcher {
  constructor(private readonly router: ProviderRouter) {}

  /**
   * Active provider for `contract`, or null when nothing can serve it
   */
  resolve<TApi extends object>(contract: CapabilityContract<TApi>): (BaseProvider & TApi) | null {
    const provider = this.router.getActiveProvider(contract);
    if (!provider) {
      return null;
    }

    if (!implementsContract(provider, contract)) {
      logger.warn(`[ProviderDispatcher] ${provider.name} does not implement ${contract.name}`);
      return null;
    }
    return provider;
  }

  require<TApi extends object>(contract: CapabilityContract<TApi>): BaseProvider & TApi {
    const provider = this.resolve(contract);
    if (!provider) {
      throw new ProviderUnavailableError(
        contract.name,
        `No provider available for contract ${contract.name}`,
        { contract: contract.name }
      );
    }
    return provider;
  }

  /**
   * Forward a call to whichever provider is active for `contract`
   */
  async invoke<TApi extends object, TResult>(
    contract: CapabilityContract<TApi>,
    call: (api: TApi) => Promise<TResult>
  ): Promise<TResult> {
    const provider = this.require(contract);
    logger.debug(`[ProviderDispatcher] Routing ${contract.name} to ${provider.name}`);
    return call(provider);
  }
}
