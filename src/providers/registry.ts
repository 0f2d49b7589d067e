/**
 * Provider registry – maps each ProviderKind to the factory that builds it.
 */
import type { Provider } from "../core/provider.js";
import { ProviderKind } from "../core/types.js";
import type { SubjectResolver } from "../resolvers/backend.js";
import type { IndexSink } from "../sinks/backend.js";
import type { StorageBackend } from "../storage/backend.js";
import { CleanupProvider } from "./cleanup/cleanup.js";
import { HarvestProvider, type HarvestSources } from "./harvest/harvest.js";
import { IndexImportProvider } from "./import/index-import.js";
import { SubjectResolveProvider } from "./resolve/subjects.js";
import { ConceptTreeTransformProvider } from "./transform/concept-tree.js";

// ---------------------------------------------------------------------------
// Environment handed to provider factories
// ---------------------------------------------------------------------------

export interface ProviderEnv {
  storage: StorageBackend;
  sources: HarvestSources;
  sink: IndexSink;
  resolver: SubjectResolver;
}

export type ProviderFactory = (env: ProviderEnv) => Provider;

export type ProviderRegistry = Record<ProviderKind, ProviderFactory>;

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const PROVIDER_REGISTRY: ProviderRegistry = {
  [ProviderKind.Harvest]: (env) => new HarvestProvider(env.storage, env.sources),
  [ProviderKind.Transform]: (env) => new ConceptTreeTransformProvider(env.storage),
  [ProviderKind.Import]: (env) => new IndexImportProvider(env.storage, env.sink),
  [ProviderKind.SubjectResolve]: (env) => new SubjectResolveProvider(env.storage, env.resolver),
  [ProviderKind.Cleanup]: (env) => new CleanupProvider(env.storage),
};

export function createProvider(
  kind: ProviderKind,
  env: ProviderEnv,
  registry: ProviderRegistry = PROVIDER_REGISTRY,
): Provider {
  const provider = registry[kind](env);
  if (provider.kind !== kind) {
    throw new Error(`Registry entry for ${kind} built a ${provider.kind} provider`);
  }
  return provider;
}
