/**
 * Study Loop Configuration
 *
 * Resolves where notes and session history live, plus the few tunables
 * the review engine exposes. Values come from (lowest to highest
 * precedence) built-in defaults, `<home>/config.yaml`, and environment
 * variables.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { formatZodError } from "@study-loop/shared";
import { errnoCode } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("StudyConfig");

/**
 * Configuration file name, looked up inside the Study Loop home directory.
 */
export const CONFIG_FILE_NAME = "config.yaml";

/**
 * Default home directory name under the user's home.
 */
export const DEFAULT_HOME_DIRNAME = ".study-loop";

/**
 * Default cadence for scheduled notes created without an explicit pattern.
 */
export const DEFAULT_SCHEDULE_PATTERN = "moderate";

/**
 * Default number of weakest questions kept in a note's priority list.
 */
export const DEFAULT_WEAK_QUESTION_LIMIT = 5;

/**
 * Schema for config.yaml. All fields are optional; relative paths are
 * resolved against the home directory.
 */
export const StudyConfigFileSchema = z
  .object({
    notesDir: z.string().min(1).optional(),
    historyDir: z.string().min(1).optional(),
    defaultSchedulePattern: z.string().min(1).optional(),
    weakQuestionLimit: z.number().int().min(1).optional(),
  })
  .strict();

export type StudyConfigFile = z.infer<typeof StudyConfigFileSchema>;

/**
 * Fully resolved configuration.
 */
export interface StudyConfig {
  /** Absolute path to the Study Loop home directory */
  homeDir: string;
  /** Absolute path to the directory holding note markdown files */
  notesDir: string;
  /** Absolute path to the directory holding session history records */
  historyDir: string;
  /** Pattern or preset name used for scheduled notes without their own */
  defaultSchedulePattern: string;
  /** How many weak questions a note keeps in priority_questions */
  weakQuestionLimit: number;
  /** REST server port */
  port: number;
  /** REST server host */
  host: string;
}

type Env = Record<string, string | undefined>;

/**
 * Loads and validates config.yaml from the home directory.
 *
 * @returns Parsed configuration, or an empty object if the file is missing
 *          or invalid (invalid files are logged, not fatal)
 */
export async function loadConfigFile(homeDir: string): Promise<StudyConfigFile> {
  const configPath = join(homeDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return {};
    }
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Failed to read config from ${configPath}: ${message}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Invalid YAML in ${configPath}: ${message}`);
    return {};
  }

  // An empty file parses to undefined
  if (raw === undefined || raw === null) {
    return {};
  }

  const result = StudyConfigFileSchema.safeParse(raw);
  if (!result.success) {
    log.warn(`Invalid config in ${configPath}: ${formatZodError(result.error)}`);
    return {};
  }

  return result.data;
}

/**
 * Get the port from environment variable or use default.
 */
export function resolvePort(env: Env): number {
  const envPort = env.PORT;
  if (envPort) {
    const parsed = parseInt(envPort, 10);
    if (!isNaN(parsed) && parsed > 0 && parsed <= 65535) {
      return parsed;
    }
    log.warn(`Invalid PORT "${envPort}", using default 3000`);
  }
  return 3000;
}

function resolveAgainst(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Resolves the full configuration.
 *
 * Environment variables:
 * - STUDY_LOOP_HOME: home directory (default ~/.study-loop)
 * - STUDY_LOOP_NOTES_DIR / STUDY_LOOP_HISTORY_DIR: override the data directories
 * - PORT / HOST: REST server binding
 */
export async function loadStudyConfig(env: Env = process.env): Promise<StudyConfig> {
  const homeDir = resolve(env.STUDY_LOOP_HOME ?? join(homedir(), DEFAULT_HOME_DIRNAME));
  const file = await loadConfigFile(homeDir);

  const notesDir = env.STUDY_LOOP_NOTES_DIR ?? file.notesDir ?? "notes";
  const historyDir = env.STUDY_LOOP_HISTORY_DIR ?? file.historyDir ?? "history";

  const config: StudyConfig = {
    homeDir,
    notesDir: resolveAgainst(homeDir, notesDir),
    historyDir: resolveAgainst(homeDir, historyDir),
    defaultSchedulePattern: file.defaultSchedulePattern ?? DEFAULT_SCHEDULE_PATTERN,
    weakQuestionLimit: file.weakQuestionLimit ?? DEFAULT_WEAK_QUESTION_LIMIT,
    port: resolvePort(env),
    host: env.HOST ?? "127.0.0.1",
  };

  log.debug("Resolved configuration", config);
  return config;
}
