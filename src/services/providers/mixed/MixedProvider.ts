/**
 * Mixed Provider
 *
 * Base class for orchestrating providers. A mixed provider does not talk to a
 * catalog itself; it answers a contract by calling the other providers the
 * router has as candidates for it.
 */

import pMap from 'p-map';
import { BaseProvider, type ProviderOptions } from '../BaseProvider.js';
import type { ProviderRouter } from '../ProviderRouter.js';
import { implementsContract } from '../CapabilityInspector.js';
import type { CapabilityContract } from '../../../types/providers/index.js';
import type { ProviderConfig } from '../../../types/provider.js';
import { ConfigManager } from '../../../config/ConfigManager.js';
import { logger } from '../../../middleware/logging.js';
import { getErrorMessage } from '../../../utils/errorHandling.js';

export interface MixedProviderOptions extends ProviderOptions {
  /**
   * Resolved on every call. The router is usually built after its providers,
   * so it cannot be passed in directly.
   */
  router: () => ProviderRouter;
  /** Sources called at once during a fan-out; defaults to routing.fanOutConcurrency */
  concurrency?: number;
}

export interface SourceResult<TResult> {
  provider: BaseProvider;
  result: TResult;
}

export abstract class MixedProvider extends BaseProvider {
  private readonly routerAccessor: () => ProviderRouter;
  private readonly concurrency: number | undefined;

  constructor(config: ProviderConfig, options: MixedProviderOptions) {
    super(config, options);
    this.routerAccessor = options.router;
    this.concurrency = options.concurrency;
  }

  protected get router(): ProviderRouter {
    return this.routerAccessor();
  }

  /**
   * Non-mixed candidates for `contract`, highest priority first.
   * Providers whose circuit is open are left out.
   */
  getSources<TApi extends object>(contract: CapabilityContract<TApi>): Array<BaseProvider & TApi> {
    const router = this.router;
    const sources: Array<BaseProvider & TApi> = [];

    for (const candidate of router.getCandidates(contract)) {
      if (candidate === this || router.isMixedFor(candidate, contract)) {
        continue;
      }
      if (!implementsContract(candidate, contract)) {
        continue;
      }
      if (candidate.circuitBreaker.isOpen()) {
        logger.debug(`[${this.name}] Skipping ${candidate.name} for ${contract.name}: circuit open`);
        continue;
      }
      sources.push(candidate);
    }

    return sources.sort((a, b) => router.priorityFor(b, contract) - router.priorityFor(a, contract));
  }

  /**
   * Call every source concurrently. Failed sources are logged and left out;
   * results keep source priority order.
   */
  protected async fanOut<TApi extends object, TResult>(
    contract: CapabilityContract<TApi>,
    operation: string,
    call: (source: TApi) => Promise<TResult>
  ): Promise<Array<SourceResult<TResult>>> {
    const sources = this.getSources(contract);
    if (sources.length === 0) {
      logger.debug(`[${this.name}] No sources available for ${contract.name}`);
      return [];
    }

    const settled = await pMap(
      sources,
      async (source): Promise<SourceResult<TResult> | null> => {
        try {
          return { provider: source, result: await call(source) };
        } catch (error) {
          logger.warn(`[${this.name}] ${source.name} failed during ${operation}`, {
            contract: contract.name,
            error: getErrorMessage(error),
          });
          return null;
        }
      },
      { concurrency: this.fanOutConcurrency() }
    );

    return settled.filter((entry): entry is SourceResult<TResult> => entry !== null);
  }

  /**
   * Ask sources one at a time, by priority, until one returns a value
   */
  protected async firstSuccessful<TApi extends object, TResult>(
    contract: CapabilityContract<TApi>,
    operation: string,
    call: (source: TApi) => Promise<TResult | null>
  ): Promise<TResult | null> {
    for (const source of this.getSources(contract)) {
      try {
        const result = await call(source);
        if (result !== null) {
          logger.debug(`[${this.name}] ${operation} answered by ${source.name}`);
          return result;
        }
      } catch (error) {
        logger.warn(`[${this.name}] ${source.name} failed during ${operation}, trying next source`, {
          contract: contract.name,
          error: getErrorMessage(error),
        });
      }
    }

    logger.debug(`[${this.name}] No source answered ${operation}`);
    return null;
  }

  private fanOutConcurrency(): number {
    return this.concurrency ?? ConfigManager.getInstance().getRoutingConfig().fanOutConcurrency;
  }
}
