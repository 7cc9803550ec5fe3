import { AshbyAdapter } from './ashby';
import { GenericHeuristicAdapter } from './generic';
import { GreenhouseAdapter } from './greenhouse';
import { LeverAdapter } from './lever';
import { AdapterOptions, SourceAdapter } from './types';

/** Lookup from a careers-platform identifier to the adapter that reads it. */
export class AdapterRegistry {
  private readonly adapters: ReadonlyMap<string, SourceAdapter>;

  constructor(adapters: SourceAdapter[]) {
    this.adapters = new Map(adapters.map(adapter => [adapter.platform, adapter]));
  }

  /** `undefined` when nothing handles the platform; callers decide what that means. */
  resolve(platform: string | null | undefined): SourceAdapter | undefined {
    if (!platform) return undefined;
    return this.adapters.get(platform.toLowerCase());
  }

  platforms(): string[] {
    return [...this.adapters.keys()];
  }
}

export function createDefaultRegistry(options: AdapterOptions = {}): AdapterRegistry {
  return new AdapterRegistry([
    new GreenhouseAdapter(options),
    new LeverAdapter(options),
    new AshbyAdapter(options),
    new GenericHeuristicAdapter(options),
  ]);
}
