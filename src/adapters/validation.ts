import { z } from "zod";
import { SearchQuery } from "../core/domain/types.js";

/**
 * Validation schemas for query strings of the search and export routes.
 * Field names match the dashboard form: reference, np, client.
 */

const criterion = z.string().max(200, "Search criteria are limited to 200 characters");

export const SearchParamsSchema = z.object({
  reference: criterion.optional(),
  np: criterion.optional(),
  client: criterion.optional(),
});

export const ExportParamsSchema = SearchParamsSchema.extend({
  format: z.enum(["csv", "xlsx"]).default("csv"),
});

export type SearchParams = z.infer<typeof SearchParamsSchema>;

export function paramsFromUrl(url: string): Record<string, string> {
  const params = new URL(url, "http://localhost").searchParams;
  return Object.fromEntries(params.entries());
}

export function toSearchQuery(params: SearchParams): SearchQuery {
  return {
    reference: params.reference,
    partNumber: params.np,
    client: params.client,
  };
}
