import { z } from 'zod';

const weightIndexSchema = z
  .object({
    metadata: z.record(z.unknown()).optional(),
    weight_map: z.record(z.string()).optional(),
  })
  .passthrough();

/**
 * Weight Index Value Object
 * Parsed `model.safetensors.index.json`: maps tensor names to the shard
 * files that hold them.
 */
export class WeightIndexVO {
  private constructor(private readonly _fileNames: readonly string[]) {}

  /**
   * @throws Error when the content is not JSON or not an index object
   */
  static parse(content: string): WeightIndexVO {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new Error(
        `Index file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const result = weightIndexSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.errors
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join('; ');
      throw new Error(`Index file has an unexpected shape: ${issues}`);
    }

    const weightMap = result.data.weight_map ?? {};
    return new WeightIndexVO([...new Set(Object.values(weightMap))]);
  }

  /**
   * Distinct shard file names, in first-seen order
   */
  get fileNames(): readonly string[] {
    return this._fileNames;
  }

  get size(): number {
    return this._fileNames.length;
  }
}
