import fs from "node:fs";
import path from "node:path";
import { config as loadDotEnv } from "dotenv";

const localEnvPath = path.resolve(process.cwd(), ".env.local");
if (fs.existsSync(localEnvPath)) {
  loadDotEnv({ path: localEnvPath, quiet: true });
}
loadDotEnv({ quiet: true });

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const DEFAULT_REWRITE_TEMPERATURE = 0.7;
export const DEFAULT_MAX_IMAGES = 10;

const DEFAULT_REWRITE_SYSTEM_INSTRUCTION = [
  "# task",
  "turn the user's rough idea into a clear, structured, actionable task description.",
  "",
  "# output format",
  "## goal",
  "one or two sentences on the end result the user wants and why it matters.",
  "",
  "## requirements",
  "**phase 1: <name>**",
  "1. <concrete action>",
  "2. <concrete action>",
  "",
  "**phase 2: <name>**",
  "3. <concrete action>",
  "4. <concrete action>",
  "",
  "**phase 3: <name>** (only when needed)",
  "5. <concrete action>",
  "",
  "**technical requirements:**",
  "- <constraint or implementation detail>",
  "",
  "**expected outcome:**",
  "<deliverables and acceptance criteria>",
  "",
  "# rules",
  "1. split the work into two or three logical phases.",
  "2. every step must be specific and doable; no vague wording.",
  "3. add the technical constraints the user implied but did not write down.",
  "4. answer in the language the user wrote in.",
].join("\n");

export type FeedbackConfig = {
  geminiApiKey: string;
  geminiModel: string;
  rewriteTemperature: number;
  rewriteStreaming: boolean;
  rewriteSystemInstruction: string;
  imagesEnabled: boolean;
  maxImages: number;
  terminalCommand: string[];
  logFile: string;
  debug: boolean;
};

export function parseBooleanFlag(name: string, value: string | undefined, fallback: boolean): boolean {
  const normalized = (value ?? "").trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
    return false;
  }
  throw new Error(`Invalid ${name} "${value}". Use true or false.`);
}

export function parseTemperature(value: string | undefined): number {
  const normalized = (value ?? "").trim();
  if (!normalized) {
    return DEFAULT_REWRITE_TEMPERATURE;
  }
  const parsed = Number(normalized);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 2) {
    throw new Error(`Invalid FEEDBACK_REWRITE_TEMPERATURE "${value}". Use a number between 0 and 2.`);
  }
  return parsed;
}

export function parseMaxImages(value: string | undefined): number {
  const normalized = (value ?? "").trim();
  if (!normalized) {
    return DEFAULT_MAX_IMAGES;
  }
  const parsed = Number(normalized);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid FEEDBACK_MAX_IMAGES "${value}". Use a non-negative integer (0 = no limit).`);
  }
  return parsed;
}

export function parseCommandPrefix(value: string | undefined): string[] {
  return (value ?? "")
    .trim()
    .split(/\s+/)
    .filter(Boolean);
}

export function loadFeedbackConfig(env: NodeJS.ProcessEnv = process.env): FeedbackConfig {
  return {
    geminiApiKey: env.FEEDBACK_GEMINI_API_KEY?.trim() || env.GEMINI_API_KEY?.trim() || "",
    geminiModel: env.FEEDBACK_GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL,
    rewriteTemperature: parseTemperature(env.FEEDBACK_REWRITE_TEMPERATURE),
    rewriteStreaming: parseBooleanFlag("FEEDBACK_REWRITE_STREAMING", env.FEEDBACK_REWRITE_STREAMING, true),
    rewriteSystemInstruction:
      env.FEEDBACK_REWRITE_SYSTEM_INSTRUCTION?.trim() || DEFAULT_REWRITE_SYSTEM_INSTRUCTION,
    imagesEnabled: parseBooleanFlag("FEEDBACK_ENABLE_IMAGES", env.FEEDBACK_ENABLE_IMAGES, false),
    maxImages: parseMaxImages(env.FEEDBACK_MAX_IMAGES),
    terminalCommand: parseCommandPrefix(env.FEEDBACK_TERMINAL_COMMAND),
    logFile: env.FEEDBACK_LOG_FILE?.trim() || "",
    debug: parseBooleanFlag("FEEDBACK_DEBUG", env.FEEDBACK_DEBUG, false),
  };
}

export const feedbackConfig = loadFeedbackConfig();
