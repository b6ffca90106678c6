export { VocabularyRegistry } from './registry';
export { loadKeysFile, parseKeysFile, resolveKeysPath, humanizeIdentifier } from './keys-loader';
