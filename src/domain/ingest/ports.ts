import type { PokemonRecord } from "@domain/ingest/pokemon";

/**
 * Port for the Pokédex data source crawled by the ingest pipeline.
 */
export interface PokemonSource {
  /** Detail page URLs in national Pokédex order, at most `limit`. */
  listPokemonUrls(limit: number, signal?: AbortSignal): Promise<string[]>;
  fetchPokemon(url: string, signal?: AbortSignal): Promise<PokemonRecord>;
}
