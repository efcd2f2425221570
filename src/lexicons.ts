// Multilingual hesitation lexicons (filler words and self-correction markers).
//
// Loaded once from data/hesitation-lexicons.json when the module is first
// imported, validated, lower-cased and frozen. Analyzers only ever read it.

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { LexiconPolicy } from "./types.js";

// ─── Schema ─────────────────────────────────────────────────────────────────────

const languageLexiconSchema = z.object({
  fillers: z.array(z.string().min(1)).min(1),
  /** Fillers that are also ordinary words; counted only in filler position */
  ambiguous: z.array(z.string().min(1)),
  selfCorrections: z.array(z.string().min(1)),
});

const lexiconFileSchema = z
  .record(z.string().regex(/^[a-z]{2,3}$/), languageLexiconSchema)
  .refine((lexicons) => Object.keys(lexicons).length > 0, {
    message: "at least one language is required",
  });

export interface LanguageLexicon {
  readonly fillers: ReadonlySet<string>;
  readonly ambiguous: ReadonlySet<string>;
  readonly selfCorrections: readonly string[];
}

/** The search set for one analysis call: the union of the resolved languages */
export interface CombinedLexicon {
  readonly languages: readonly string[];
  readonly fillers: ReadonlySet<string>;
  readonly ambiguous: ReadonlySet<string>;
  readonly selfCorrections: readonly string[];
}

// ─── Loading ────────────────────────────────────────────────────────────────────

const LEXICON_FILE = new URL("../data/hesitation-lexicons.json", import.meta.url);

/**
 * Parse and normalise lexicon JSON. Exported for tests; production code uses
 * the module-level LEXICONS table.
 */
export function parseLexicons(json: unknown): ReadonlyMap<string, LanguageLexicon> {
  const parsed = lexiconFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "lexicons"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid hesitation lexicon data: ${issues}`);
  }

  const lexicons = new Map<string, LanguageLexicon>();
  for (const [language, entry] of Object.entries(parsed.data)) {
    lexicons.set(
      language,
      Object.freeze({
        fillers: new Set(entry.fillers.map((f) => f.toLowerCase())),
        ambiguous: new Set(entry.ambiguous.map((f) => f.toLowerCase())),
        selfCorrections: Object.freeze([...entry.selfCorrections]),
      }),
    );
  }
  return lexicons;
}

function loadLexicons(): ReadonlyMap<string, LanguageLexicon> {
  const raw: unknown = JSON.parse(readFileSync(LEXICON_FILE, "utf-8"));
  return parseLexicons(raw);
}

/** Process-wide lexicon table, keyed by ISO 639-1 base code */
export const LEXICONS: ReadonlyMap<string, LanguageLexicon> = loadLexicons();

export const SUPPORTED_LANGUAGES: readonly string[] = Object.freeze([...LEXICONS.keys()]);

// ─── Resolution ─────────────────────────────────────────────────────────────────

/** "fr-FR" → "fr", "EN_us" → "en" */
export function normalizeLanguageCode(code: string): string {
  return code.trim().split(/[-_]/)[0].toLowerCase();
}

/**
 * Ordered list of languages to search.
 *
 * A recognised detected language always comes first. Under the "union" policy
 * every other supported language follows, so fillers from a misdetected
 * language are still caught. Under "detected-only" the detected language is
 * used alone, falling back to the union when it is missing or unsupported.
 */
export function resolveLanguages(
  detectedLanguage: string | null | undefined,
  policy: LexiconPolicy,
  lexicons: ReadonlyMap<string, LanguageLexicon> = LEXICONS,
): string[] {
  const languages: string[] = [];

  if (detectedLanguage) {
    const primary = normalizeLanguageCode(detectedLanguage);
    if (lexicons.has(primary)) {
      languages.push(primary);
      if (policy === "detected-only") return languages;
    }
  }

  for (const language of lexicons.keys()) {
    if (!languages.includes(language)) languages.push(language);
  }
  return languages;
}

/**
 * Union the lexicons of the given languages (in order, duplicates dropped).
 */
export function combineLexicons(
  languages: readonly string[],
  lexicons: ReadonlyMap<string, LanguageLexicon> = LEXICONS,
): CombinedLexicon {
  const fillers = new Set<string>();
  const ambiguous = new Set<string>();
  const selfCorrections: string[] = [];
  const seenMarkers = new Set<string>();

  for (const language of languages) {
    const lexicon = lexicons.get(language);
    if (!lexicon) continue;
    for (const f of lexicon.fillers) fillers.add(f);
    for (const a of lexicon.ambiguous) ambiguous.add(a);
    for (const marker of lexicon.selfCorrections) {
      const key = marker.toLowerCase();
      if (seenMarkers.has(key)) continue;
      seenMarkers.add(key);
      selfCorrections.push(marker);
    }
  }

  return { languages: [...languages], fillers, ambiguous, selfCorrections };
}
