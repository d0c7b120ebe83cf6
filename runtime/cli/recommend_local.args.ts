export interface RecommendLocalArgs {
  query: string;
  sessionId: string;
  n: number;
  language?: string;
  exclusions: string[];
  catalogPath?: string;
  taxonomyPath?: string;
  sessionBackend?: string;
  sqlitePath?: string;
  showHistory: boolean;
}

const DEFAULT_SESSION_ID = "local";
const DEFAULT_COUNT = 10;

const VALUE_FLAGS = [
  "--session",
  "--n",
  "--lang",
  "--exclude",
  "--catalog",
  "--taxonomy",
  "--backend",
  "--sqlite",
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(token: string): token is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(token);
}

function parseCount(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_COUNT;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid --n "${raw}". Expected an integer >= 0`);
  }
  return parsed;
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
}

export function parseRecommendLocalArgs(argv: string[]): RecommendLocalArgs {
  const positional: string[] = [];
  const values = new Map<ValueFlag, string>();
  const exclusions: string[] = [];
  let showHistory = false;
  let queryOnly = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (queryOnly) {
      positional.push(token);
      continue;
    }
    if (token === "--") {
      queryOnly = true;
      continue;
    }
    if (token === "--history") {
      showHistory = true;
      continue;
    }
    if (isValueFlag(token)) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.trim() === "") {
        throw new Error(`Missing value for ${token}`);
      }
      i += 1;
      if (token === "--exclude") {
        exclusions.push(...splitList(next));
      } else {
        values.set(token, next.trim());
      }
      continue;
    }
    positional.push(token);
  }

  return {
    query: positional.join(" ").trim(),
    sessionId: values.get("--session") ?? DEFAULT_SESSION_ID,
    n: parseCount(values.get("--n")),
    language: values.get("--lang"),
    exclusions,
    catalogPath: values.get("--catalog"),
    taxonomyPath: values.get("--taxonomy"),
    sessionBackend: values.get("--backend"),
    sqlitePath: values.get("--sqlite"),
    showHistory,
  };
}
