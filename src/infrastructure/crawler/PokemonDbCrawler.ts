/**
 * Pokédex crawler for pokemondb.net.
 *
 * Fetches pages sequentially with a politeness delay, a per-request timeout
 * and a fixed user agent, and never leaves the configured host. Parsing is
 * done with regular expressions over the server-rendered markup.
 */
import type { PokemonSource } from "@domain/ingest/ports";
import {
  emptyPokemonRecord,
  type PokemonRecord,
  type StatName,
} from "@domain/ingest/pokemon";
import {
  attribute,
  captureAll,
  sectionAfter,
  textOf,
} from "@infrastructure/crawler/html";
import { logger } from "@infrastructure/logging/Logger";
import { InfrastructureError, ValidationError } from "@typesLocal/AppError";
import { runWithDeadline, sleep } from "@utils/deadline";

const USER_AGENT = "PokedexRagBot/1.0";

export interface CrawlerOptions {
  baseUrl: string;
  delayMs: number;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

const STAT_HEADERS = new Map<string, StatName | "total">([
  ["HP", "hp"],
  ["Attack", "attack"],
  ["Defense", "defense"],
  ["Sp. Atk", "specialAttack"],
  ["Sp. Def", "specialDefense"],
  ["Speed", "speed"],
  ["Total", "total"],
]);

const LIST_LINK =
  /class="infocard-lg-img"[^>]*>\s*<a[^>]*href="(\/pokedex\/[^"#?]+)"/gi;
const TABLE_ROW = /<tr[^>]*>([\s\S]*?)<\/tr>/gi;
const TYPE_ICON = /<a[^>]*class="[^"]*type-icon[^"]*"[^>]*>([\s\S]*?)<\/a>/gi;
const ANCHOR_TEXT = /<a[^>]*>([\s\S]*?)<\/a>/gi;
const STAT_CELL = /<td[^>]*class="[^"]*cell-num[^"]*"[^>]*>([\s\S]*?)<\/td>/i;
const TYPE_FX_CELL = /<td[^>]*type-fx-cell[^>]*>/gi;
const EVOLUTION_NAME = /<a[^>]*class="ent-name"[^>]*>([\s\S]*?)<\/a>/gi;

/** Detail page URLs from the national Pokédex page, in page order. */
export function parsePokedexList(
  html: string,
  baseUrl: string,
  limit: number
): string[] {
  const urls: string[] = [];
  for (const path of captureAll(html, LIST_LINK)) {
    const url = new URL(path, baseUrl).toString();
    if (!urls.includes(url)) {
      urls.push(url);
    }
    if (urls.length >= limit) break;
  }
  return urls;
}

function firstMatch(html: string, pattern: RegExp): string {
  return html.match(pattern)?.[1] ?? "";
}

function parseVitalsRow(record: PokemonRecord, row: string): void {
  const header = textOf(firstMatch(row, /<th[^>]*>([\s\S]*?)<\/th>/i));
  const cell = firstMatch(row, /<td[^>]*>([\s\S]*?)<\/td>/i);

  switch (header) {
    case "National №":
      record.number ||= textOf(cell);
      return;
    case "Type":
      if (record.types.length === 0) {
        record.types = captureAll(cell, TYPE_ICON).map(textOf).filter(Boolean);
      }
      return;
    case "Species":
      record.category ||= textOf(cell);
      return;
    case "Height":
      record.height ||= textOf(cell);
      return;
    case "Weight":
      record.weight ||= textOf(cell);
      return;
    case "Abilities":
      if (record.abilities.length === 0) {
        const visible = cell.replace(/<small[\s\S]*?<\/small>/gi, "");
        record.abilities = captureAll(visible, ANCHOR_TEXT)
          .map(textOf)
          .filter(Boolean);
      }
      return;
  }

  const stat = STAT_HEADERS.get(header);
  if (stat !== undefined && record.stats[stat] === undefined) {
    const value = parseInt(textOf(firstMatch(row, STAT_CELL)), 10);
    if (Number.isFinite(value)) {
      record.stats[stat] = value;
    }
  }
}

function parseTypeDefenses(record: PokemonRecord, html: string): void {
  const section = sectionAfter(html, "Type defenses", "<h2");
  const weak = new Set<string>();
  const strong = new Set<string>();

  for (const match of section.matchAll(TYPE_FX_CELL)) {
    const tag = match[0];
    const title = attribute(tag, "title") ?? "";
    const attacker = title.split("→")[0]?.trim();
    const multiplier = Number(
      firstMatch(attribute(tag, "class") ?? "", /type-fx-(\d+)/)
    );
    if (!attacker) continue;

    if (multiplier > 100) {
      weak.add(attacker);
    } else if (multiplier < 100) {
      strong.add(attacker);
    }
  }

  record.weakAgainst = [...weak];
  record.strongAgainst = [...strong];
}

/** Extracts a record from a Pokémon detail page. */
export function parsePokemonPage(html: string): PokemonRecord {
  const record = emptyPokemonRecord();

  record.name = textOf(
    firstMatch(html, /<main[\s\S]*?<h1[^>]*>([\s\S]*?)<\/h1>/i)
  );

  for (const row of captureAll(html, TABLE_ROW)) {
    parseVitalsRow(record, row);
  }

  const entries = sectionAfter(html, "Pokédex entries", "</table>");
  record.description = textOf(
    firstMatch(entries, /<td[^>]*class="cell-med-text"[^>]*>([\s\S]*?)<\/td>/i)
  );

  parseTypeDefenses(record, html);

  const evolutions = sectionAfter(html, "infocard-list-evo", "<h2");
  record.evolutions = [
    ...new Set(captureAll(evolutions, EVOLUTION_NAME).map(textOf)),
  ].filter((name) => name && name !== record.name);

  return record;
}

export class PokemonDbCrawler implements PokemonSource {
  private readonly host: string;
  private readonly fetchFn: typeof fetch;
  /** Earliest time the next request may start. */
  private nextRequestAt = 0;

  constructor(private readonly options: CrawlerOptions) {
    this.host = new URL(options.baseUrl).host;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async listPokemonUrls(
    limit: number,
    signal?: AbortSignal
  ): Promise<string[]> {
    const html = await this.fetchPage(
      new URL("/pokedex/national", this.options.baseUrl).toString(),
      signal
    );
    return parsePokedexList(html, this.options.baseUrl, limit);
  }

  async fetchPokemon(
    url: string,
    signal?: AbortSignal
  ): Promise<PokemonRecord> {
    const record = parsePokemonPage(await this.fetchPage(url, signal));
    if (!record.name) {
      throw new InfrastructureError(
        `failed to extract pokemon data from ${url}`,
        502,
        { url }
      );
    }
    return record;
  }

  private async fetchPage(url: string, signal?: AbortSignal): Promise<string> {
    if (new URL(url).host !== this.host) {
      throw new ValidationError(`refusing to crawl outside ${this.host}`, {
        url,
      });
    }

    // Reserve a slot before waiting so concurrent callers queue behind it.
    const now = Date.now();
    const slot = Math.max(now, this.nextRequestAt);
    this.nextRequestAt = slot + this.options.delayMs;
    if (slot > now) {
      await sleep(slot - now, signal);
    }

    logger.log("debug", "CRAWL_FETCH", { url });

    return runWithDeadline(
      `crawl ${url}`,
      async (deadline) => {
        const res = await this.fetchFn(url, {
          headers: {
            "User-Agent": USER_AGENT,
            Accept: "text/html,application/xhtml+xml",
          },
          redirect: "follow",
          signal: deadline,
        });

        if (!res.ok) {
          throw new InfrastructureError(
            `crawl of ${url} failed with status ${res.status}`,
            502,
            { url, status: res.status }
          );
        }

        return res.text();
      },
      { timeoutMs: this.options.timeoutMs, signal }
    );
  }
}
