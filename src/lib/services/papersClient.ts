/**
 * Paper search against a Semantic Scholar style graph API.
 */

import { z } from "zod";
import type { ExecutionGuard } from "../execution/executionGuard.js";
import { ValidationError } from "../errors.js";
import { getJson } from "./http.js";

export const PAPERS_SERVICE = "papers";

export interface Paper {
  id: string;
  title: string;
  abstract: string;
  year: number | null;
  authors: string[];
  url: string | null;
}

const SEARCH_FIELDS = "title,abstract,year,authors,url";

const SearchResponseSchema = z.object({
  data: z
    .array(
      z.object({
        paperId: z.string(),
        title: z.string().nullish(),
        abstract: z.string().nullish(),
        year: z.number().nullish(),
        authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
        url: z.string().nullish(),
      })
    )
    .default([]),
});

export class PapersClient {
  constructor(private readonly baseURL: string) {}

  /** Papers without an abstract are dropped; there is nothing to analyze. */
  async search(guard: ExecutionGuard, query: string, limit: number): Promise<Paper[]> {
    const raw = await guard.execute(
      PAPERS_SERVICE,
      (credential, signal) =>
        getJson(this.baseURL, "paper/search", {
          query: { query, limit, fields: SEARCH_FIELDS },
          headers: { "x-api-key": credential.secret },
          signal,
        }),
      { label: `search "${query}"` }
    );
    const parsed = SearchResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Unexpected paper search response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data.data
      .filter((p) => (p.abstract ?? "").trim() !== "")
      .map((p) => ({
        id: p.paperId,
        title: p.title?.trim() || "(untitled)",
        abstract: (p.abstract ?? "").trim(),
        year: p.year ?? null,
        authors: (p.authors ?? []).flatMap((a) => (a.name ? [a.name] : [])),
        url: p.url ?? null,
      }));
  }
}
