/**
 * Known layout of a pretrained model artifact set.
 */

export const MODEL_INDEX_FILE = 'model.safetensors.index.json';

/**
 * Files fetched by name when the bucket cannot be listed.
 */
export const AUXILIARY_MODEL_FILES: readonly string[] = [
  'config.json',
  'tokenizer.json',
  'tokenizer_config.json',
  'special_tokens_map.json',
  'generation_config.json',
];

/**
 * Whether a listed key is a model artifact rather than a directory marker,
 * cache entry or lock/metadata file left behind by a hub client.
 */
export function isDownloadableKey(key: string): boolean {
  if (key.endsWith('/')) {
    return false;
  }
  if (key.includes('.cache') || key.endsWith('.lock') || key.endsWith('.metadata')) {
    return false;
  }
  return true;
}
