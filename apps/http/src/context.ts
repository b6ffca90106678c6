// apps/http/src/context.ts
// Process-scoped state, built once at startup and shared read-only by every request.

import type { KeyEntry, KeysFile } from '@lexirule/core';
import { ConfigurationError, log } from '@lexirule/core';
import type { ExtractOptions, MapperOptions } from '@lexirule/mapper';
import { createMapperOptions } from '@lexirule/mapper';
import type { ValidatorOptions } from '@lexirule/validator';
import { createValidatorOptions } from '@lexirule/validator';
import { VocabularyRegistry, humanizeIdentifier, loadKeysFile } from '@lexirule/vocab';
import type { AppConfig } from './config';
import type { Embedder } from './embeddings';
import { createEmbedder } from './embeddings';
import type { SnippetRetriever } from './retrieval';
import { PolicyRetriever } from './retrieval';
import type { RuleDrafter } from './drafting';
import { createDrafter } from './drafting';

export interface AppContext {
  config: AppConfig;
  registry: VocabularyRegistry;
  embedder: Embedder;
  retriever: SnippetRetriever;
  drafter: RuleDrafter;
  extractOptions: ExtractOptions;
  mapperOptions: MapperOptions;
  validatorOptions: ValidatorOptions;
}

/**
 * Builds the registry from a keys file. Entries without a stored embedding are
 * embedded from their humanised identifier; stored embeddings must match the
 * embedder's dimension.
 */
export async function buildRegistry(file: KeysFile, embedder: Embedder): Promise<VocabularyRegistry> {
  const missing = file.keys.filter((k) => !k.embedding);
  const computed = missing.length
    ? await embedder.embed(missing.map((k) => humanizeIdentifier(k.key)))
    : [];
  const byKey = new Map(missing.map((k, i) => [k.key, computed[i]]));

  const entries: KeyEntry[] = file.keys.map((k) => {
    const embedding = k.embedding ?? byKey.get(k.key) ?? [];
    if (k.embedding && k.embedding.length !== embedder.dimension) {
      throw new ConfigurationError(
        `Stored embedding for ${k.key} has dimension ${k.embedding.length}; embedder produces ${embedder.dimension}`
      );
    }
    return {
      identifier: k.key,
      embedding,
      ...(k.type ? { type: k.type } : {}),
      ...(k.description ? { description: k.description } : {})
    };
  });
  return VocabularyRegistry.load(entries);
}

export function optionsFromConfig(config: AppConfig): Pick<AppContext, 'extractOptions' | 'mapperOptions' | 'validatorOptions'> {
  return {
    extractOptions: {
      maxPhraseWords: config.mapping.maxPhraseWords,
      maxCandidates: config.mapping.maxCandidates
    },
    mapperOptions: createMapperOptions({
      threshold: config.mapping.threshold,
      topK: config.mapping.topK,
      literalSimilarity: config.mapping.literalSimilarity
    }),
    validatorOptions: createValidatorOptions({
      allowedOperators: config.validation.allowedOperators,
      maxDepth: config.validation.maxDepth
    })
  };
}

export async function createContext(config: AppConfig): Promise<AppContext> {
  const options = optionsFromConfig(config);
  const embedder = createEmbedder(config);
  const registry = await buildRegistry(loadKeysFile(config.paths.keys), embedder);
  const retriever = await PolicyRetriever.fromFile(config.paths.policyDocs, embedder, {
    topK: config.rag.topK,
    threshold: config.rag.threshold
  });
  const drafter = createDrafter(config);

  log.info(
    {
      keys: registry.size,
      dimension: registry.dimension,
      embedder: embedder.name,
      drafter: drafter.name,
      threshold: options.mapperOptions.threshold,
      topK: options.mapperOptions.topK,
      maxDepth: options.validatorOptions.maxDepth,
      restrictToMappedKeys: config.validation.restrictToMappedKeys
    },
    'context-ready'
  );

  return { config, registry, embedder, retriever, drafter, ...options };
}
