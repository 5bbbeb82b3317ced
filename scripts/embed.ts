/**
 * Embed one text per line of a file (or stdin).
 *
 * Usage:
 *   npx tsx scripts/embed.ts [file] [--gas n] [--batch-size n]
 *     [--concurrency n] [--strict] [--trace] [--out file]
 *
 * Reads .env.local for OPENAI_API_KEY and EMBED_* settings. Prints one
 * JSON line per input; inputs that could not be embedded get `null`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { loadConfig } from "../src/lib/config";
import { extractError } from "../src/lib/error";
import { logger, setLogLevel } from "../src/lib/logger";
import { createEmbedder } from "../src/lib/openai/embeddings";
import { sessionFromEnv } from "../src/lib/session";

const log = logger("cli");

// Settings already in the environment win over .env.local
function loadEnvFile(envPath: string) {
  if (!fs.existsSync(envPath)) return;
  const envContent = fs.readFileSync(envPath, "utf-8");
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}

function toCount(name: string, value: string | undefined, fallback: number) {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

async function main() {
  loadEnvFile(path.resolve(process.cwd(), ".env.local"));

  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      gas: { type: "string" },
      "batch-size": { type: "string" },
      concurrency: { type: "string" },
      strict: { type: "boolean", default: false },
      trace: { type: "boolean" },
      out: { type: "string" },
    },
  });

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const session = sessionFromEnv();

  const source = positionals[0];
  const texts = fs
    .readFileSync(source ?? 0, "utf-8")
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);

  log.info("inputs loaded", {
    source: source ?? "stdin",
    texts: texts.length,
    model: session.model,
  });

  const embedder = createEmbedder(session);
  const results = await embedder.embedAll(texts, {
    gas: toCount("gas", values.gas, config.gas),
    batchSize: Math.max(
      1,
      toCount("batch-size", values["batch-size"], config.batchSize),
    ),
    concurrency: Math.max(
      1,
      toCount("concurrency", values.concurrency, config.concurrency),
    ),
    trace: values.trace ?? config.trace,
    strict: values.strict,
  });

  const lines = results.map((embedding, index) =>
    JSON.stringify({ index, embedding }),
  );
  if (values.out) {
    fs.writeFileSync(values.out, lines.join("\n") + "\n");
  } else {
    for (const line of lines) console.log(line);
  }

  const missing = results.filter((r) => r === null).length;
  log.info("done", { embedded: results.length - missing, missing });
}

main().catch((err) => {
  log.error("fatal", { error: extractError(err) });
  process.exit(1);
});
