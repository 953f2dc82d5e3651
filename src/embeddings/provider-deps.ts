/**
 * provider-deps.ts - Lazy loaders for embedding provider SDKs
 *
 * Each provider SDK is only required when the factory selects that
 * provider, so a process that embeds with HuggingFace never loads the
 * OpenAI or Voyage packages (and keeps working if they're not installed).
 *
 * Each loader returns the module or null when the package is missing.
 * Other load failures (syntax errors, broken transitive dependencies) are
 * rethrown. Tests vi.mock("./provider-deps") to simulate either case.
 */

import { isModuleNotFound } from "../utils/module-loading";

export function loadOpenAI(): typeof import("openai") | null {
  try {
    return require("openai");
  } catch (error) {
    if (isModuleNotFound(error, "openai")) return null;
    throw error;
  }
}

export function loadHuggingFaceInference(): typeof import("@huggingface/inference") | null {
  try {
    return require("@huggingface/inference");
  } catch (error) {
    if (isModuleNotFound(error, "@huggingface/inference")) return null;
    throw error;
  }
}

export function loadVoyageAI(): typeof import("voyageai") | null {
  try {
    return require("voyageai");
  } catch (error) {
    if (isModuleNotFound(error, "voyageai")) return null;
    throw error;
  }
}
