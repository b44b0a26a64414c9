import path from "node:path";
import { z } from "zod";
import {
  ChannelFamilySchema,
  ParameterOperationSchema,
  ParameterUnitSchema,
  RiskTierSchema,
  SignalTagSchema,
  type ChannelFamily
} from "./schemas.js";
import { configRootAbs, tryReadJsonFile } from "./utils.js";

const CatalogEntrySchema = z
  .object({
    actionType: z.string().regex(/^[a-z][a-z0-9_]*$/),
    families: z.array(ChannelFamilySchema).min(1),
    description: z.string().min(1),
    parameter: z.string().min(1),
    operation: ParameterOperationSchema,
    unit: ParameterUnitSchema,
    defaultValue: z.number().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    riskTier: RiskTierSchema,
    requiresApproval: z.boolean(),
    contraindications: z.array(SignalTagSchema)
  })
  .strict()
  .superRefine((entry, ctx) => {
    if (entry.min !== undefined && entry.max !== undefined && entry.min > entry.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${entry.actionType}: min exceeds max`, path: ["min"] });
    }
    if (entry.unit === "none" && entry.defaultValue !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${entry.actionType}: unitless actions take no value`,
        path: ["defaultValue"]
      });
    }
  });

export const ActionCatalogSchema = z
  .object({
    version: z.string().min(1),
    entries: z.array(CatalogEntrySchema).min(1)
  })
  .strict()
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.entries.forEach((entry, idx) => {
      if (seen.has(entry.actionType)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate actionType ${entry.actionType}`,
          path: ["entries", idx, "actionType"]
        });
      }
      seen.add(entry.actionType);
    });
  });

export const ChannelRoutingSchema = z
  .object({
    version: z.string().min(1),
    fallbackFamily: ChannelFamilySchema,
    channels: z.record(
      z.string().min(1),
      z.object({ family: ChannelFamilySchema, platform: z.string().min(1) }).strict()
    )
  })
  .strict();

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;
export type ActionCatalog = z.infer<typeof ActionCatalogSchema>;
export type ChannelRouting = z.infer<typeof ChannelRoutingSchema>;

export type EngineConfig = {
  catalog: ActionCatalog;
  routing: ChannelRouting;
};

export const ACTION_CATALOG_FILE = "action_catalog.json";
export const CHANNEL_ROUTING_FILE = "channel_routing.json";

async function loadValidated<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const raw = await tryReadJsonFile<unknown>(filePath);
  if (raw === null) throw new Error(`Config file missing or not JSON: ${filePath}`);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`Invalid config ${path.basename(filePath)}: ${detail}`);
  }
  return parsed.data;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** Loaded once at boot and shared read-only by every run. Invalid files abort startup. */
export async function loadEngineConfig(dir = configRootAbs()): Promise<EngineConfig> {
  const catalog = await loadValidated(path.join(dir, ACTION_CATALOG_FILE), ActionCatalogSchema);
  const routing = await loadValidated(path.join(dir, CHANNEL_ROUTING_FILE), ChannelRoutingSchema);
  return deepFreeze({ catalog, routing });
}

export function normalizeChannel(channel: string): string {
  return channel.trim().toLowerCase();
}

export function findCatalogEntry(catalog: ActionCatalog, actionType: string): CatalogEntry | undefined {
  return catalog.entries.find((e) => e.actionType === actionType);
}

export function catalogEntriesFor(catalog: ActionCatalog, family: ChannelFamily): CatalogEntry[] {
  return catalog.entries.filter((e) => e.families.includes(family));
}

export function routeFromTable(
  routing: ChannelRouting,
  channel: string
): { family: ChannelFamily; platform: string } | null {
  return routing.channels[normalizeChannel(channel)] ?? null;
}

export function platformFor(routing: ChannelRouting, channel: string): string {
  return routeFromTable(routing, channel)?.platform ?? normalizeChannel(channel);
}
