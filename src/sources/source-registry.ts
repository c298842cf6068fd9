import { InvalidUrlError, UnsupportedError } from '../errors/custom-errors';
import type { SourceAdapter, SourceRegistry } from '../types/source.types';
import { extractDomain, isValidUrl } from '../utils/url-utils';
import { DCUniverseInfiniteSource } from './impl/dc-universe-infinite-source';
import { FlippSource } from './impl/flipp-source';
import { IzneoSource } from './impl/izneo-source';
import { LeagueOfLegendsSource } from './impl/league-of-legends-source';
import { LocalComicSource } from './impl/local-comic-source';
import { MangaPlusSource } from './impl/manga-plus-source';
import { MarvelSource } from './impl/marvel-source';
import { WebtoonSource } from './impl/webtoon-source';

/**
 * Source registry implementation
 */
export class Registry implements SourceRegistry {
  private adapters: Map<string, SourceAdapter> = new Map();

  /**
   * Register an adapter; a later registration for the same platform replaces it
   */
  register(adapter: SourceAdapter): void {
    this.adapters.set(adapter.platform, adapter);
  }

  /**
   * Get adapter for a URL or, for adapters that read local files, a path
   * @throws InvalidUrlError if no adapter takes the string and it is not a URL
   * @throws UnsupportedError if no platform handles the URL's host
   */
  getForUrl(url: string): SourceAdapter {
    for (const adapter of this.adapters.values()) {
      if (adapter.supports(url)) {
        return adapter;
      }
    }

    if (!isValidUrl(url)) {
      throw new InvalidUrlError(`Invalid URL: "${url}"`, url);
    }

    throw new UnsupportedError(
      `No source found for domain: "${extractDomain(url)}". Supported sources: ${this.getPlatforms().join(', ')}`,
    );
  }

  /**
   * Get adapter by platform id or display name (case-insensitive)
   */
  getByPlatform(platform: string): SourceAdapter | undefined {
    const exact = this.adapters.get(platform);
    if (exact) return exact;

    const wanted = platform.toLowerCase();
    for (const adapter of this.adapters.values()) {
      if (adapter.platform.toLowerCase() === wanted || adapter.displayName.toLowerCase() === wanted) {
        return adapter;
      }
    }
    return undefined;
  }

  /**
   * Get all registered platform ids
   */
  getPlatforms(): string[] {
    return Array.from(this.adapters.keys());
  }
}

/**
 * Registry with every built-in platform
 */
export function createDefaultRegistry(): Registry {
  const registry = new Registry();
  registry.register(new WebtoonSource());
  registry.register(new MangaPlusSource());
  registry.register(new IzneoSource());
  registry.register(new DCUniverseInfiniteSource());
  registry.register(new MarvelSource());
  registry.register(new FlippSource());
  registry.register(new LeagueOfLegendsSource());
  registry.register(new LocalComicSource());
  return registry;
}
