/**
 * Materials summary lookup against a Materials Project style API.
 */

import { z } from "zod";
import type { ExecutionGuard } from "../execution/executionGuard.js";
import { ValidationError } from "../errors.js";
import { getJson } from "./http.js";

export const MATERIALS_SERVICE = "materials";

export interface MaterialEntry {
  materialId: string;
  formula: string;
  energyAboveHull: number | null;
  formationEnergyPerAtom: number | null;
  bandGap: number | null;
}

const SUMMARY_FIELDS = ["material_id", "formula_pretty", "energy_above_hull", "formation_energy_per_atom", "band_gap"];

const SummaryResponseSchema = z.object({
  data: z.array(
    z.object({
      material_id: z.string(),
      formula_pretty: z.string().nullish(),
      energy_above_hull: z.number().nullish(),
      formation_energy_per_atom: z.number().nullish(),
      band_gap: z.number().nullish(),
    })
  ),
});

export class MaterialsClient {
  constructor(private readonly baseURL: string) {}

  async searchByFormula(guard: ExecutionGuard, formula: string, limit = 20): Promise<MaterialEntry[]> {
    const raw = await guard.execute(
      MATERIALS_SERVICE,
      (credential, signal) =>
        getJson(this.baseURL, "materials/summary/", {
          query: { formula, _fields: SUMMARY_FIELDS.join(","), _limit: limit },
          headers: { "X-API-KEY": credential.secret },
          signal,
        }),
      { label: `formula ${formula}` }
    );
    const parsed = SummaryResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Unexpected materials response for ${formula}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data.data.map((m) => ({
      materialId: m.material_id,
      formula: m.formula_pretty ?? formula,
      energyAboveHull: m.energy_above_hull ?? null,
      formationEnergyPerAtom: m.formation_energy_per_atom ?? null,
      bandGap: m.band_gap ?? null,
    }));
  }
}
