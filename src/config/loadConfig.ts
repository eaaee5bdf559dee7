import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { readBooleanEnv, readEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PROFILE_ID,
  DEFAULT_STATE_DIR,
  OUTPUT_FORMATS,
  isOutputFormat,
  type OutputFormat
} from "./defaults.js";
import { ConfigInvalidOutputFormatError, ConfigParseError } from "../errors/config.errors.js";
import { findProfile, mergeProfiles, validateProfile } from "../classify/profiles.js";
import { mergeFieldAliases } from "../normalize/fields.js";
import type { FieldAliases, Predicate, Profile, ProfileRule } from "../types.js";

const matchFieldSchema = z.enum(["asset", "location", "tier"]);

const predicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("contains"), field: matchFieldSchema, values: z.array(z.string().min(1)).min(1) }),
    z.object({ kind: z.literal("oneOf"), field: matchFieldSchema, values: z.array(z.string().min(1)).min(1) }),
    z.object({ kind: z.literal("all"), predicates: z.array(predicateSchema).min(1) }),
    z.object({ kind: z.literal("any"), predicates: z.array(predicateSchema).min(1) }),
    z.object({ kind: z.literal("not"), predicate: predicateSchema })
  ])
);

const ruleSchema: z.ZodType<ProfileRule> = z.lazy(() =>
  z.union([
    z
      .object({
        when: predicateSchema,
        pool: z.string().min(1),
        rules: z.array(ruleSchema),
        defaultGroup: z.string().min(1)
      })
      .strict(),
    z.object({ when: predicateSchema, group: z.string().min(1) }).strict()
  ])
);

const profileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  groups: z.array(z.string()).min(1),
  defaultGroup: z.string().min(1),
  rules: z.array(ruleSchema),
  exploitGroups: z.array(z.string()).default([]),
  severity: z
    .object({
      match: z.enum(["contains", "exact"]).default("contains"),
      unrecognized: z.enum(["fold", "separate"]).default("separate")
    })
    .default({})
});

const aliasList = z.array(z.string().min(1)).optional();

const configFileSchema = z
  .object({
    defaultProfile: z.string().min(1).optional(),
    stateDir: z.string().min(1).optional(),
    profiles: z.array(profileSchema).optional(),
    fields: z
      .object({
        asset: aliasList,
        location: aliasList,
        severity: aliasList,
        tier: aliasList,
        exploit: aliasList,
        firstDetected: aliasList,
        resolvedAt: aliasList,
        status: aliasList
      })
      .strict()
      .optional(),
    output: z
      .object({
        dir: z.string().min(1).optional(),
        format: z.enum(OUTPUT_FORMATS).optional(),
        includeAge: z.boolean().optional()
      })
      .strict()
      .optional(),
    diagnostics: z.object({ checkOverlaps: z.boolean().optional() }).strict().optional()
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export interface TriageConfig {
  projectRoot: string;
  configPath: string | null;
  stateDir: string;
  defaultProfile: string;
  profiles: Profile[];
  fields: FieldAliases;
  output: {
    dir: string;
    format: OutputFormat;
    includeAge: boolean;
  };
  diagnostics: {
    checkOverlaps: boolean;
  };
}

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: Partial<TriageConfig>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

async function loadConfigFile(
  projectRoot: string,
  configPath?: string | null
): Promise<{ path: string | null; file: ConfigFile }> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigParseError(candidate, message);
    }
    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigParseError(candidate, formatIssues(result.error));
    }
    return { path: candidate, file: result.data };
  }

  if (configPath) {
    throw new ConfigParseError(path.resolve(projectRoot, configPath), "file does not exist");
  }
  return { path: null, file: {} };
}

function resolveFormat(fileFormat: OutputFormat | undefined): OutputFormat {
  const fromEnv = readEnv("TRIAGE_FORMAT");
  if (fromEnv) {
    const lowered = fromEnv.toLowerCase();
    if (!isOutputFormat(lowered)) throw new ConfigInvalidOutputFormatError(fromEnv);
    return lowered;
  }
  return fileFormat ?? "text";
}

export async function loadConfig(params: LoadConfigParams): Promise<TriageConfig> {
  const { path: configPath, file } = await loadConfigFile(params.projectRoot, params.configPath);

  const configured: Profile[] = (file.profiles ?? []).map((profile) => ({
    ...profile,
    name: profile.name ?? profile.id
  }));

  const cfg: TriageConfig = {
    projectRoot: params.projectRoot,
    configPath,
    stateDir: path.resolve(params.projectRoot, readEnv("TRIAGE_STATE_DIR") || file.stateDir || DEFAULT_STATE_DIR),
    defaultProfile: readEnv("TRIAGE_PROFILE") || file.defaultProfile || DEFAULT_PROFILE_ID,
    profiles: mergeProfiles(configured),
    fields: mergeFieldAliases(file.fields),
    output: {
      dir: path.resolve(params.projectRoot, readEnv("TRIAGE_OUTPUT_DIR") || file.output?.dir || DEFAULT_OUTPUT_DIR),
      format: resolveFormat(file.output?.format),
      includeAge: readBooleanEnv("TRIAGE_INCLUDE_AGE") ?? file.output?.includeAge ?? false
    },
    diagnostics: {
      checkOverlaps: file.diagnostics?.checkOverlaps ?? true
    }
  };

  const resolved: TriageConfig = { ...cfg, ...params.overrides };
  resolved.profiles.forEach(validateProfile);
  findProfile(resolved.profiles, resolved.defaultProfile);
  return resolved;
}
