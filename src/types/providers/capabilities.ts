/**
 * Provider Capabilities Type Definitions
 *
 * A provider declares, up front, which capability contracts it serves and how
 * strongly it wants to serve each of them. The router reads these declarations
 * instead of discovering behaviour at runtime.
 */

/**
 * Untyped view of a contract, used wherever contracts of different APIs are
 * stored side by side (declarations, routing tables).
 */
export interface ContractDefinition {
  /** Unique key the router files candidates under */
  readonly name: string;
  /** Methods a provider must expose to serve the contract */
  readonly methods: readonly string[];
}

/**
 * A capability contract bound to the API its providers implement.
 *
 * @example
 * const ARTIST_INFO = defineContract<ArtistInfoApi>('artist-info', ['getArtistInfo']);
 */
export interface CapabilityContract<TApi extends object> extends ContractDefinition {
  readonly methods: readonly (keyof TApi & string)[];
}

export interface CapabilityDeclaration {
  contract: ContractDefinition;
  /** Higher wins. Ties go to whichever provider registered first. */
  priority: number;
  /**
   * Participate as orchestrator for this contract. Defaults to the provider's
   * own `mixed` marker; only mixed providers may set it.
   */
  mixed?: boolean;
}

/**
 * Complete provider capabilities declaration
 */
export interface ProviderCapabilities {
  id: string;
  name: string;
  version: string;
  /** Mixed-provider marker: eligible to orchestrate other providers */
  mixed: boolean;
  declarations: CapabilityDeclaration[];
}

/**
 * Resolved routing metadata for one contract on one provider
 */
export interface ContractBinding {
  contract: ContractDefinition;
  priority: number;
  mixed: boolean;
}
