/**
 * Pokédex record and its text rendering for the vector index.
 *
 * The rendering is split into `=== Title ===` sections so the chunker's first
 * separator keeps each section together.
 */

export const STAT_LABELS = {
  hp: "HP",
  attack: "Attack",
  defense: "Defense",
  specialAttack: "Special Attack",
  specialDefense: "Special Defense",
  speed: "Speed",
} as const;

export type StatName = keyof typeof STAT_LABELS;

export type BaseStats = Partial<Record<StatName | "total", number>>;

export interface PokemonRecord {
  name: string;
  /** National Pokédex number as printed, e.g. "0006". */
  number: string;
  types: string[];
  category: string;
  height: string;
  weight: string;
  abilities: string[];
  stats: BaseStats;
  description: string;
  evolutions: string[];
  weakAgainst: string[];
  strongAgainst: string[];
}

export function emptyPokemonRecord(): PokemonRecord {
  return {
    name: "",
    number: "",
    types: [],
    category: "",
    height: "",
    weight: "",
    abilities: [],
    stats: {},
    description: "",
    evolutions: [],
    weakAgainst: [],
    strongAgainst: [],
  };
}

const STAT_ORDER: readonly StatName[] = [
  "hp",
  "attack",
  "defense",
  "specialAttack",
  "specialDefense",
  "speed",
];

function section(title: string, lines: string[]): string {
  return `=== ${title} ===\n${lines.map((line) => `${line}\n`).join("")}\n`;
}

/** Highest non-total stat; the earlier stat wins a tie. */
export function highestStat(
  stats: BaseStats
): { name: StatName; value: number } | undefined {
  let best: { name: StatName; value: number } | undefined;
  for (const name of STAT_ORDER) {
    const value = stats[name];
    if (value !== undefined && value > (best?.value ?? 0)) {
      best = { name, value };
    }
  }
  return best;
}

export function formatPokemonForRag(pokemon: PokemonRecord): string {
  const parts: string[] = [];

  parts.push(
    pokemon.number
      ? `Pokemon: ${pokemon.name} (#${pokemon.number})\n\n`
      : `Pokemon: ${pokemon.name}\n\n`
  );

  const basics = [
    pokemon.types.length > 0 ? `Type: ${pokemon.types.join(", ")}` : "",
    pokemon.category ? `Category: ${pokemon.category}` : "",
    pokemon.height ? `Height: ${pokemon.height}` : "",
    pokemon.weight ? `Weight: ${pokemon.weight}` : "",
  ].filter(Boolean);
  parts.push(section("Basic Information", basics));

  if (pokemon.description) {
    parts.push(section("Description", [pokemon.description]));
  }

  if (pokemon.abilities.length > 0) {
    parts.push(section("Abilities", [pokemon.abilities.join(", ")]));
  }

  const statLines: string[] = [];
  for (const name of STAT_ORDER) {
    const value = pokemon.stats[name];
    if (value !== undefined) {
      statLines.push(`${STAT_LABELS[name]}: ${value}`);
    }
  }
  if (pokemon.stats.total !== undefined) {
    statLines.push(`Total: ${pokemon.stats.total}`);
  }
  if (statLines.length > 0) {
    parts.push(section("Base Stats", statLines));
  }

  const effectiveness = [
    pokemon.weakAgainst.length > 0
      ? `Weak against: ${pokemon.weakAgainst.join(", ")}`
      : "",
    pokemon.strongAgainst.length > 0
      ? `Strong against: ${pokemon.strongAgainst.join(", ")}`
      : "",
  ].filter(Boolean);
  if (effectiveness.length > 0) {
    parts.push(section("Type Effectiveness", effectiveness));
  }

  if (pokemon.evolutions.length > 0) {
    parts.push(
      section("Evolution Chain", [
        `Evolves to/from: ${pokemon.evolutions.join(" → ")}`,
      ])
    );
  }

  const facts = [
    `- ${pokemon.name} is a ${pokemon.types.join("/")} type Pokemon`,
  ];
  const best = highestStat(pokemon.stats);
  if (best) {
    facts.push(`- Highest stat: ${STAT_LABELS[best.name]} (${best.value})`);
  }
  const primaryAbility = pokemon.abilities[0];
  if (primaryAbility) {
    facts.push(`- Primary ability: ${primaryAbility}`);
  }
  parts.push(`=== Quick Facts ===\n${facts.join("\n")}\n`);

  return parts.join("");
}
