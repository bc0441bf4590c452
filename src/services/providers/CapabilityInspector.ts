/**
 * Capability Inspector
 *
 * Turns a provider's declared capabilities into the routing metadata the
 * router works from, and rejects declarations that cannot be routed.
 */

import { z } from 'zod';
import type { BaseProvider } from './BaseProvider.js';
import type {
  CapabilityContract,
  ContractBinding,
  ContractDefinition,
  ProviderCapabilities,
} from '../../types/providers/index.js';
import { ConfigurationError, ErrorCode } from '../../errors/index.js';

const contractSchema = z.object({
  name: z.string().min(1, 'Contract name must not be empty'),
  methods: z.array(z.string().min(1)).min(1, 'Contract must name at least one method'),
});

const capabilitiesSchema = z.object({
  id: z.string().min(1, 'Provider id must not be empty'),
  name: z.string().min(1, 'Provider name must not be empty'),
  version: z.string(),
  mixed: z.boolean(),
  declarations: z.array(
    z.object({
      contract: contractSchema,
      priority: z.number().int('Priority must be an integer'),
      mixed: z.boolean().optional(),
    })
  ),
});

/**
 * Routing metadata for one provider, computed once at registration
 */
export interface ProviderDescriptor {
  provider: BaseProvider;
  bindings: Map<string, ContractBinding>;
}

/**
 * Define a capability contract.
 *
 * @param name - unique routing key
 * @param methods - methods every provider of the contract must implement
 */
export function defineContract<TApi extends object>(
  name: string,
  methods: readonly (keyof TApi & string)[]
): CapabilityContract<TApi> {
  return Object.freeze({ name, methods: Object.freeze([...methods]) });
}

/**
 * Whether `provider` exposes every method `contract` requires
 */
export function implementsContract<TApi extends object>(
  provider: BaseProvider,
  contract: CapabilityContract<TApi>
): provider is BaseProvider & TApi {
  return missingMethods(provider, contract).length === 0;
}

function missingMethods(provider: BaseProvider, contract: ContractDefinition): string[] {
  return contract.methods.filter(method => typeof Reflect.get(provider, method) !== 'function');
}

function describeProvider(provider: BaseProvider): string {
  return provider.constructor.name || provider.id;
}

/**
 * Inspect a provider's capabilities.
 * Throws ConfigurationError when the declarations are inconsistent.
 */
export function inspectProvider(provider: BaseProvider): ProviderDescriptor {
  const label = describeProvider(provider);
  const capabilities: ProviderCapabilities = provider.getCapabilities();

  const parsed = capabilitiesSchema.safeParse(capabilities);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(
      label,
      `Provider ${label} has invalid capability declarations: ${issues.join('; ')}`,
      ErrorCode.CAPABILITY_DECLARATION_INVALID
    );
  }

  const bindings = new Map<string, ContractBinding>();
  const problems: string[] = [];

  for (const declaration of capabilities.declarations) {
    const contractName = declaration.contract.name;

    if (bindings.has(contractName)) {
      problems.push(`contract ${contractName} is declared more than once`);
      continue;
    }

    const mixed = declaration.mixed ?? capabilities.mixed;
    if (mixed && !capabilities.mixed) {
      problems.push(`contract ${contractName} is declared mixed but the provider is not a mixed provider`);
    }

    const missing = missingMethods(provider, declaration.contract);
    if (missing.length > 0) {
      problems.push(`missing methods for ${contractName}: ${missing.join(', ')}`);
    }

    bindings.set(contractName, {
      contract: declaration.contract,
      priority: declaration.priority,
      mixed,
    });
  }

  if (problems.length > 0) {
    throw new ConfigurationError(
      label,
      `Provider ${label} has invalid capability declarations: ${problems.join('; ')}`,
      ErrorCode.CAPABILITY_DECLARATION_INVALID
    );
  }

  return { provider, bindings };
}
