/**
 * Per-session preference and evaluation files:
 * `<CACHE_DIR>/sessions/<sessionId>.json`.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { env } from "./env";
import { ValidationError } from "./errors";
import { createLogger } from "./logger";
import {
  beerEvaluationSchema,
  parseOrThrow,
  preferenceValueSchema,
  type BeerEvaluation,
  type PreferenceValue,
} from "./models";

const log = createLogger("preferences");

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/** Evaluations needed before preferences can be analysed. */
export const MIN_EVALUATIONS_FOR_ANALYSIS = 2;

const sessionFileSchema = z.object({
  preferences: z.record(z.string(), preferenceValueSchema).default({}),
  evaluations: z.array(beerEvaluationSchema).default([]),
});

type SessionFile = z.infer<typeof sessionFileSchema>;

export type EvaluationInput = Omit<BeerEvaluation, "timestamp">;

export interface PreferenceAnalysis {
  ready: boolean;
  evaluations: BeerEvaluation[];
  message: string;
}

export class PreferenceStore {
  readonly dir: string;
  private readonly chains = new Map<string, Promise<unknown>>();

  constructor(options: { cacheDir?: string } = {}) {
    this.dir = path.join(options.cacheDir ?? env.CACHE_DIR, "sessions");
  }

  private fileFor(sessionId: string): string {
    if (!SAFE_ID.test(sessionId)) {
      throw new ValidationError(`Session ID '${sessionId}' is not a valid file name`);
    }
    return path.join(this.dir, `${sessionId}.json`);
  }

  private async read(sessionId: string): Promise<SessionFile> {
    const file = this.fileFor(sessionId);
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch {
      return { preferences: {}, evaluations: [] };
    }
    return sessionFileSchema.parse(JSON.parse(raw));
  }

  /** Serialise read-modify-write cycles per session. */
  private update<T>(sessionId: string, fn: (data: SessionFile) => T): Promise<T> {
    const file = this.fileFor(sessionId);
    const previous = this.chains.get(sessionId) ?? Promise.resolve();

    const next = previous
      .catch(() => undefined)
      .then(async () => {
        const data = await this.read(sessionId);
        const result = fn(data);
        await mkdir(this.dir, { recursive: true });
        await writeFile(file, JSON.stringify(data, null, 2), "utf-8");
        return result;
      });

    this.chains.set(sessionId, next);
    const cleanup = () => {
      if (this.chains.get(sessionId) === next) this.chains.delete(sessionId);
    };
    void next.then(cleanup, cleanup);
    return next;
  }

  async storePreference(
    sessionId: string,
    key: string,
    value: PreferenceValue,
  ): Promise<Record<string, PreferenceValue>> {
    if (!key.trim()) throw new ValidationError("Preference key must be a non-empty string");
    const parsed = parseOrThrow(preferenceValueSchema, value);

    const preferences = await this.update(sessionId, (data) => {
      data.preferences[key] = parsed;
      return { ...data.preferences };
    });
    log.info("stored preference", { sessionId, key });
    return preferences;
  }

  async getPreferences(sessionId: string): Promise<Record<string, PreferenceValue>> {
    return (await this.read(sessionId)).preferences;
  }

  async storeEvaluation(
    sessionId: string,
    input: EvaluationInput,
  ): Promise<{ evaluation: BeerEvaluation; total: number }> {
    const evaluation = parseOrThrow(beerEvaluationSchema, {
      ...input,
      timestamp: new Date(),
    });

    const total = await this.update(sessionId, (data) => {
      data.evaluations.push(evaluation);
      return data.evaluations.length;
    });
    log.info("stored evaluation", { sessionId, beerId: evaluation.beerId, total });
    return { evaluation, total };
  }

  async getEvaluations(sessionId: string): Promise<BeerEvaluation[]> {
    return (await this.read(sessionId)).evaluations;
  }

  async analyzePreferences(sessionId: string): Promise<PreferenceAnalysis> {
    const evaluations = await this.getEvaluations(sessionId);

    if (!evaluations.length) {
      return {
        ready: false,
        evaluations,
        message: "No session data found. User needs to evaluate beers first.",
      };
    }

    if (evaluations.length < MIN_EVALUATIONS_FOR_ANALYSIS) {
      return {
        ready: false,
        evaluations,
        message: `Only ${evaluations.length} evaluation(s) available. Need at least ${MIN_EVALUATIONS_FOR_ANALYSIS} to analyze patterns.`,
      };
    }

    return {
      ready: true,
      evaluations,
      message: `Found ${evaluations.length} evaluations. Analyze the patterns and use store_preference to save each component of the preference profile.`,
    };
  }
}

export const preferenceStore = new PreferenceStore();
