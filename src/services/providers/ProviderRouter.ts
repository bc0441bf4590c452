/**
 * Provider Router
 *
 * Decides, per capability contract, which single provider answers calls.
 *
 * Each contract has a candidate list (providers that declare it and are
 * enabled, in registration order) and at most one active provider. Selection:
 * - no non-mixed candidate: fall back to the best default among all known providers
 * - one non-mixed candidate: it wins outright (singleton mode)
 * - several: a mixed provider orchestrates them; without one, the best
 *   non-mixed candidate serves alone (degraded mode)
 *
 * Providers the router enables on its own are tracked per contract as defaults
 * and retracted as soon as a provider is registered explicitly for the contract.
 *
 * All state is mutated synchronously from a single call, so lookups never
 * observe a half-updated table.
 */

import { EventEmitter } from 'events';
import type { BaseProvider } from './BaseProvider.js';
import { inspectProvider, type ProviderDescriptor } from './CapabilityInspector.js';
import type { ContractDefinition } from '../../types/providers/index.js';
import { ConfigurationError, ErrorCode } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export const PROVIDER_STATUS_CHANGED = 'statusChanged';

/**
 * Enumerates installed providers, e.g. a factory building them from configuration
 */
export interface ProviderSource {
  getAvailableProviders(): BaseProvider[];
}

export type ProviderStatusAction = 'activated' | 'deactivated';

export type ProviderStatusReason =
  | 'initialized'
  | 'registered'
  | 'unregistered'
  | 'enabled'
  | 'disabled'
  | 'default';

export interface ProviderStatusChangedEvent {
  provider: BaseProvider;
  action: ProviderStatusAction;
  reason: ProviderStatusReason;
}

export interface RoutingEntry {
  contract: string;
  candidates: string[];
  active: string | null;
  defaultProvider: string | null;
}

export interface RejectedProvider {
  provider: string;
  reason: string;
}

export interface ProviderRouterOptions {
  providers?: BaseProvider[];
  source?: ProviderSource;
}

type ContractKey = ContractDefinition | string;

function contractName(contract: ContractKey): string {
  return typeof contract === 'string' ? contract : contract.name;
}

export class ProviderRouter extends EventEmitter {
  private providers: BaseProvider[];
  private readonly source: ProviderSource | undefined;
  private readonly descriptors = new Map<BaseProvider, ProviderDescriptor>();
  private readonly rejected = new Map<BaseProvider, string>();

  // Providers registered explicitly (user enabled or direct registration)
  private readonly registered = new Set<BaseProvider>();
  // Providers disabled at runtime; never picked automatically until re-enabled
  private readonly suppressed = new Set<BaseProvider>();

  private readonly candidates = new Map<string, BaseProvider[]>();
  private readonly active = new Map<string, BaseProvider>();
  private readonly defaults = new Map<string, BaseProvider>();

  private initialized = false;

  constructor(options: ProviderRouterOptions = {}) {
    super();
    this.providers = [...(options.providers ?? [])];
    this.source = options.source;
  }

  // ============================================
  // PUBLIC OPERATIONS
  // ============================================

  /**
   * Gather, validate and activate providers. Safe to call more than once.
   */
  initialize(): void {
    if (this.initialized) {
      logger.debug('[ProviderRouter] Already initialized');
      return;
    }

    logger.debug('[ProviderRouter] Initializing provider routing');

    this.track('initialized', () => {
      this.providers = this.discoverProviders().filter(provider => this.describe(provider) !== null);

      for (const provider of this.providers) {
        if (provider.isEnabled()) {
          logger.debug(`[ProviderRouter] Activating provider: ${provider.name}`, {
            mixed: provider.isMixed,
            contracts: this.bindingsOf(provider).length,
          });
          this.addCandidate(provider);
        }
      }

      this.recompute(this.declaredContracts());
    });

    this.initialized = true;
    logger.info(
      `[ProviderRouter] Initialized provider routing: ${this.getActiveProviders().length} active providers, ${this.candidates.size} contract mappings`
    );
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Add a provider to the candidate list of every contract it declares.
   * Returns false when its declarations were rejected.
   */
  registerProvider(provider: BaseProvider): boolean {
    return this.track('registered', () => this.register(provider));
  }

  /**
   * Remove a provider from routing entirely. It is forgotten: default
   * selection will not pick it again unless it is registered anew.
   */
  unregisterProvider(provider: BaseProvider): void {
    this.track('unregistered', () => {
      // Forget it first so recomputation cannot pick it again
      this.providers = this.providers.filter(known => known !== provider);
      this.suppressed.delete(provider);

      const emptied = this.detach(provider);
      emptied.forEach(name => this.removeEntry(name));
      this.descriptors.delete(provider);
      this.rejected.delete(provider);
    });
    logger.debug(`[ProviderRouter] Unregistered provider ${provider.name}`);
  }

  /**
   * Active provider for a contract. When none is set, a default is selected on
   * demand; returns null only when no known provider can serve the contract.
   */
  getActiveProvider(contract: ContractKey): BaseProvider | null {
    const name = contractName(contract);
    const current = this.active.get(name);
    if (current) {
      return current;
    }

    return this.track('default', () => this.updateActiveSafely(name));
  }

  /**
   * Manually pin the active provider. It must be a candidate for the contract;
   * the pin holds until the contract's candidates next change.
   */
  setActiveProvider(contract: ContractKey, provider: BaseProvider): void {
    const name = contractName(contract);
    if (!this.candidates.get(name)?.includes(provider)) {
      throw new ConfigurationError(
        name,
        `Provider ${provider.name} is not registered for contract ${name}`,
        ErrorCode.ROUTING_NOT_A_CANDIDATE
      );
    }

    this.active.set(name, provider);
    logger.debug(`[ProviderRouter] Set active provider for ${name} to ${provider.name}`);
  }

  /**
   * React to a configuration change for the provider persisted as `providerId`
   */
  notify(providerId: string, enabled: boolean): void {
    const provider = this.providers.find(known => known.id === providerId);
    if (!provider) {
      logger.debug(`[ProviderRouter] Ignoring change for unknown provider: ${providerId}`);
      return;
    }

    provider.setEnabled(enabled);
    if (enabled) {
      this.enable(provider);
    } else {
      this.disable(provider);
    }
  }

  onStatusChanged(listener: (event: ProviderStatusChangedEvent) => void): () => void {
    this.on(PROVIDER_STATUS_CHANGED, listener);
    return () => {
      this.off(PROVIDER_STATUS_CHANGED, listener);
    };
  }

  // ============================================
  // QUERIES
  // ============================================

  getProviders(): BaseProvider[] {
    return [...this.providers];
  }

  getActiveProviders(): BaseProvider[] {
    return this.providers.filter(provider => this.isActive(provider));
  }

  getDefaultProviders(): BaseProvider[] {
    return [...new Set(this.defaults.values())];
  }

  getCandidates(contract: ContractKey): BaseProvider[] {
    return [...(this.candidates.get(contractName(contract)) ?? [])];
  }

  getRejectedProviders(): RejectedProvider[] {
    return [...this.rejected].map(([provider, reason]) => ({
      provider: provider.constructor.name,
      reason,
    }));
  }

  isMixedFor(provider: BaseProvider, contract: ContractKey): boolean {
    return this.bindingFor(provider, contractName(contract))?.mixed ?? false;
  }

  priorityFor(provider: BaseProvider, contract: ContractKey): number {
    return this.bindingFor(provider, contractName(contract))?.priority ?? 0;
  }

  getRoutingTable(): RoutingEntry[] {
    return [...this.candidates].map(([name, list]) => ({
      contract: name,
      candidates: list.map(provider => provider.name),
      active: this.active.get(name)?.name ?? null,
      defaultProvider: this.defaults.get(name)?.name ?? null,
    }));
  }

  // ============================================
  // ENABLE / DISABLE
  // ============================================

  private enable(provider: BaseProvider): void {
    if (this.registered.has(provider)) {
      return;
    }

    const registered = this.track('enabled', () => {
      this.suppressed.delete(provider);
      return this.register(provider);
    });

    if (registered) {
      logger.info(`[ProviderRouter] Enabled provider: ${provider.name}`);
    } else {
      logger.warn(`[ProviderRouter] Could not enable provider ${provider.name}: capability declarations were rejected`);
    }
  }

  private disable(provider: BaseProvider): void {
    this.suppressed.add(provider);
    if (!this.isActive(provider)) {
      return;
    }

    this.track('disabled', () => {
      const defaultFor = this.contractsDefaultedTo(provider);
      const emptied = this.detach(provider);

      for (const name of emptied) {
        if (defaultFor.includes(name)) {
          // It was the last default here: pick another one if possible
          this.updateActiveSafely(name);
        } else {
          this.removeEntry(name);
        }
      }
    });
    logger.info(`[ProviderRouter] Disabled provider: ${provider.name}`);
  }

  // ============================================
  // REGISTRATION TABLE
  // ============================================

  private register(provider: BaseProvider): boolean {
    if (!this.describe(provider)) {
      return false;
    }

    if (!this.providers.includes(provider)) {
      this.providers.push(provider);
    }

    this.recompute(this.addCandidate(provider));
    return true;
  }

  /**
   * Returns the contracts whose routing needs recomputing
   */
  private addCandidate(provider: BaseProvider): string[] {
    this.registered.add(provider);

    // A default enabled explicitly is now an ordinary candidate
    for (const name of this.contractsDefaultedTo(provider)) {
      this.defaults.delete(name);
    }

    const changed: string[] = [];
    for (const binding of this.bindingsOf(provider)) {
      const name = binding.contract.name;
      const list = this.listFor(name);
      let modified = this.retractDefault(name, provider);

      if (!list.includes(provider)) {
        list.push(provider);
        modified = true;
        logger.debug(`[ProviderRouter] Mapped ${name} -> ${provider.name} (priority: ${binding.priority})`);
      }

      if (modified || !this.active.has(name)) {
        changed.push(name);
      }
    }
    return changed;
  }

  /**
   * Remove a provider from every candidate list. Returns the contracts left
   * with no candidates; the others are recomputed here.
   */
  private detach(provider: BaseProvider): string[] {
    this.registered.delete(provider);
    for (const name of this.contractsDefaultedTo(provider)) {
      this.defaults.delete(name);
    }

    const changed: string[] = [];
    for (const [name, list] of this.candidates) {
      const index = list.indexOf(provider);
      if (index >= 0) {
        list.splice(index, 1);
        changed.push(name);
      }
    }

    const emptied = changed.filter(name => this.listFor(name).length === 0);
    this.recompute(changed.filter(name => !emptied.includes(name)));
    return emptied;
  }

  private retractDefault(name: string, replacement: BaseProvider): boolean {
    const current = this.defaults.get(name);
    if (!current || current === replacement) {
      return false;
    }

    this.defaults.delete(name);
    const list = this.listFor(name);
    list.splice(list.indexOf(current), 1);
    logger.debug(`[ProviderRouter] Removed superseded default provider ${current.name} for ${name}`);
    return true;
  }

  private attachDefault(name: string, provider: BaseProvider): void {
    const list = this.listFor(name);
    if (list.includes(provider)) {
      return;
    }

    list.push(provider);
    this.defaults.set(name, provider);
    logger.debug(`[ProviderRouter] Auto-selected default provider for ${name}: ${provider.name}`);
  }

  private removeEntry(name: string): void {
    this.candidates.delete(name);
    this.active.delete(name);
    this.defaults.delete(name);
    logger.debug(`[ProviderRouter] Removed all mappings for ${name}`);
  }

  private listFor(name: string): BaseProvider[] {
    let list = this.candidates.get(name);
    if (!list) {
      list = [];
      this.candidates.set(name, list);
    }
    return list;
  }

  // ============================================
  // SELECTION
  // ============================================

  private recompute(names: Iterable<string>): void {
    for (const name of new Set(names)) {
      this.updateActiveSafely(name);
    }
  }

  /**
   * Recompute one contract without letting a failure reach other contracts
   */
  private updateActiveSafely(name: string): BaseProvider | null {
    try {
      return this.updateActive(name);
    } catch (error) {
      logger.error(`[ProviderRouter] Failed to update routing for ${name}`, {
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  private updateActive(name: string): BaseProvider | null {
    const selected = this.selectOptimalProvider(name, [...(this.candidates.get(name) ?? [])]);
    if (selected) {
      this.active.set(name, selected);
    } else {
      this.removeEntry(name);
    }
    return selected;
  }

  private selectOptimalProvider(name: string, available: BaseProvider[]): BaseProvider | null {
    const nonMixed = available.filter(provider => !this.isMixedFor(provider, name));
    const mixed = available.filter(provider => this.isMixedFor(provider, name));

    switch (nonMixed.length) {
      case 0:
        return this.selectDefaultProvider(name);
      case 1:
        logger.debug(`[ProviderRouter] Single provider mode for ${name}: ${nonMixed[0].name}`);
        return nonMixed[0];
      default:
        return this.selectOrchestrator(name, nonMixed, mixed);
    }
  }

  /**
   * Nothing enabled serves the contract directly: enable the best known
   * provider for it, preferring one that does not need others to orchestrate.
   */
  private selectDefaultProvider(name: string): BaseProvider | null {
    const pool = this.eligibleFor(name);
    const selected =
      this.highestPriority(pool.filter(provider => !this.isMixedFor(provider, name)), name) ??
      this.highestPriority(pool, name);

    if (!selected) {
      logger.warn(`[ProviderRouter] No provider available for contract ${name}`);
      return null;
    }

    logger.debug(`[ProviderRouter] No active providers for ${name}, using default: ${selected.name}`);
    this.attachDefault(name, selected);
    return selected;
  }

  private selectOrchestrator(
    name: string,
    nonMixed: BaseProvider[],
    mixed: BaseProvider[]
  ): BaseProvider | null {
    let orchestrator = this.highestPriority(mixed, name);

    if (!orchestrator) {
      orchestrator = this.highestPriority(
        this.eligibleFor(name).filter(provider => this.isMixedFor(provider, name)),
        name
      );
      if (orchestrator) {
        this.attachDefault(name, orchestrator);
      }
    }

    if (orchestrator) {
      logger.debug(`[ProviderRouter] Multiple providers for ${name}, using orchestrator: ${orchestrator.name}`);
      return orchestrator;
    }

    const fallback = this.highestPriority(nonMixed, name);
    logger.warn(
      `[ProviderRouter] Multiple providers for ${name} but no orchestrator available, using: ${fallback?.name ?? '(none)'}`
    );
    return fallback;
  }

  /**
   * Strictly descending priority; the earliest entry wins a tie
   */
  private highestPriority(providers: BaseProvider[], name: string): BaseProvider | null {
    let best: BaseProvider | null = null;
    let bestPriority = 0;

    for (const provider of providers) {
      const priority = this.priorityFor(provider, name);
      if (best === null || priority > bestPriority) {
        best = provider;
        bestPriority = priority;
      }
    }
    return best;
  }

  /**
   * Known providers that may be enabled automatically for a contract
   */
  private eligibleFor(name: string): BaseProvider[] {
    return this.providers.filter(
      provider => !this.suppressed.has(provider) && this.bindingFor(provider, name) !== undefined
    );
  }

  // ============================================
  // DESCRIPTORS & BOOKKEEPING
  // ============================================

  private discoverProviders(): BaseProvider[] {
    let fromSource: BaseProvider[] = [];
    if (this.source) {
      try {
        fromSource = this.source.getAvailableProviders();
      } catch (error) {
        logger.error('[ProviderRouter] Failed to enumerate providers from source', {
          error: getErrorMessage(error),
        });
      }
    }

    // One instance per concrete implementation
    const seen = new Set<Function>();
    return [...this.providers, ...fromSource].filter(provider => {
      if (seen.has(provider.constructor)) {
        return false;
      }
      seen.add(provider.constructor);
      return true;
    });
  }

  /**
   * Inspect a provider once. Invalid declarations exclude it from routing.
   */
  private describe(provider: BaseProvider): ProviderDescriptor | null {
    const cached = this.descriptors.get(provider);
    if (cached) {
      return cached;
    }
    if (this.rejected.has(provider)) {
      return null;
    }

    try {
      const descriptor = inspectProvider(provider);
      this.descriptors.set(provider, descriptor);
      logger.debug(`[ProviderRouter] Validated provider implementation: ${provider.name}`);
      return descriptor;
    } catch (error) {
      const reason = getErrorMessage(error);
      this.rejected.set(provider, reason);
      logger.warn(`[ProviderRouter] ${reason}. Provider will be excluded from routing.`);
      return null;
    }
  }

  private bindingsOf(provider: BaseProvider) {
    return [...(this.describe(provider)?.bindings.values() ?? [])];
  }

  private bindingFor(provider: BaseProvider, name: string) {
    return this.describe(provider)?.bindings.get(name);
  }

  private declaredContracts(): string[] {
    return this.providers.flatMap(provider => this.bindingsOf(provider).map(binding => binding.contract.name));
  }

  private contractsDefaultedTo(provider: BaseProvider): string[] {
    return [...this.defaults].filter(([, selected]) => selected === provider).map(([name]) => name);
  }

  private isActive(provider: BaseProvider): boolean {
    return this.registered.has(provider) || this.contractsDefaultedTo(provider).length > 0;
  }

  /**
   * Run a mutation and announce every provider whose active status changed
   */
  private track<T>(reason: ProviderStatusReason, mutation: () => T): T {
    const before = new Set(this.getActiveProviders());
    const result = mutation();
    const after = new Set(this.getActiveProviders());

    for (const provider of after) {
      if (!before.has(provider)) {
        const cause = this.registered.has(provider) ? reason : 'default';
        this.emitStatus({ provider, action: 'activated', reason: cause });
      }
    }
    for (const provider of before) {
      if (!after.has(provider)) {
        this.emitStatus({ provider, action: 'deactivated', reason });
      }
    }
    return result;
  }

  /**
   * Call each listener in isolation: one failing listener must not hide the
   * event from the others
   */
  private emitStatus(event: ProviderStatusChangedEvent): void {
    logger.debug(`[ProviderRouter] Provider ${event.provider.name} ${event.action} (${event.reason})`);
    for (const listener of this.listeners(PROVIDER_STATUS_CHANGED)) {
      try {
        listener.call(this, event);
      } catch (error) {
        logger.error('[ProviderRouter] Status listener failed', {
          provider: event.provider.name,
          error: getErrorMessage(error),
        });
      }
    }
  }
}
