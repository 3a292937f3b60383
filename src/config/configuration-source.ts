import { isRecord } from "../core/guards";

/**
 * Nested `section.key` values contributed by one configuration layer.
 */
export type ConfigurationLayer = Record<string, Record<string, unknown>>;

export interface NamedLayer {
  name: string;
  values: ConfigurationLayer;
}

/**
 * Read-only view of one section; later layers override earlier ones key by key.
 */
export class SectionReader {
  constructor(
    readonly section: string,
    private readonly values: Readonly<Record<string, unknown>>,
  ) {}

  raw(key: string): unknown {
    return this.values[key];
  }

  string(key: string, fallback: string): string {
    const value = this.values[key];
    return typeof value === "string" ? value : fallback;
  }

  optionalString(key: string): string | undefined {
    const value = this.values[key];
    return typeof value === "string" && value !== "" ? value : undefined;
  }

  number(key: string, fallback: number): number {
    const value = this.values[key];
    return typeof value === "number" && Number.isFinite(value) ? value : fallback;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.values[key];
    return typeof value === "boolean" ? value : fallback;
  }

  stringArray(key: string): string[] | undefined {
    const value = this.values[key];
    if (!Array.isArray(value)) {
      return undefined;
    }
    return value.filter((item): item is string => typeof item === "string");
  }

  stringRecord(key: string): Record<string, string> | undefined {
    const value = this.values[key];
    if (!isRecord(value)) {
      return undefined;
    }
    const result: Record<string, string> = {};
    for (const [name, item] of Object.entries(value)) {
      if (typeof item === "string") {
        result[name] = item;
      }
    }
    return result;
  }

  record(key: string): Record<string, unknown> | undefined {
    const value = this.values[key];
    return isRecord(value) ? value : undefined;
  }
}

/**
 * Configuration assembled from ordered layers, lowest precedence first.
 */
export class LayeredConfigurationSource {
  private readonly layers: NamedLayer[] = [];

  addLayer(name: string, values: ConfigurationLayer): this {
    this.layers.push({ name, values });
    return this;
  }

  get layerNames(): string[] {
    return this.layers.map((layer) => layer.name);
  }

  /**
   * Merged view of every layer. Values set to `undefined` do not override.
   */
  merged(): ConfigurationLayer {
    const result: ConfigurationLayer = {};
    for (const layer of this.layers) {
      for (const [section, values] of Object.entries(layer.values)) {
        const target = (result[section] ??= {});
        for (const [key, value] of Object.entries(values)) {
          if (value !== undefined) {
            target[key] = value;
          }
        }
      }
    }
    return result;
  }

  getSection(section: string): SectionReader {
    return new SectionReader(section, this.merged()[section] ?? {});
  }
}

/**
 * Converts a parsed JSON config file into a layer, rejecting non-object sections.
 */
export function toConfigurationLayer(value: unknown): ConfigurationLayer | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const layer: ConfigurationLayer = {};
  for (const [section, values] of Object.entries(value)) {
    if (!isRecord(values)) {
      return undefined;
    }
    layer[section] = { ...values };
  }
  return layer;
}
