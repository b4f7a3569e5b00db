/**
 * Awards Smoke Test
 *
 * Runs the award snapshot and competitor intel builders over
 * scripts/fixtures/sample-pages.json and prints both payloads. Uses the local
 * Ollama model when it answers, otherwise deterministic extraction only.
 *
 * Run (from repo root): npm run smoke
 */

import './load-env.js';
import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { OllamaClient, loadLlmSettings, createCompletionCapability } from '@bidsignal/llm';
import { buildAwardSnapshot, buildCompetitorIntel } from '@bidsignal/agents';

const FIXTURE_PATH = fileURLToPath(new URL('./fixtures/sample-pages.json', import.meta.url));

async function main() {
  if (!fs.existsSync(FIXTURE_PATH)) {
    console.error('Fixture not found for awards smoke test:', FIXTURE_PATH);
    process.exit(1);
  }

  const pages: unknown = JSON.parse(fs.readFileSync(FIXTURE_PATH, 'utf-8'));
  const query = process.argv[2] ?? '데이터 플랫폼 구축';

  const settings = loadLlmSettings();
  let capability = createCompletionCapability(settings);
  if (capability && !(await new OllamaClient(settings.baseUrl).isAvailable())) {
    console.log(`[WARN] Ollama not reachable at ${settings.baseUrl}; running deterministic-only`);
    capability = null;
  }

  console.log(`Awards smoke test for "${query}" (model: ${capability ? settings.model : 'none'})`);

  const snapshot = await buildAwardSnapshot(pages, query, {
    capability,
    log: ({ level, message }) => {
      if (level === 'debug' && process.env.LOG_LEVEL !== 'debug') return;
      console.log(`[${level.toUpperCase()}] ${message}`);
    },
  });
  console.log('\n--- Award snapshot');
  console.log(JSON.stringify(snapshot, null, 2));

  const intel = buildCompetitorIntel(pages, query);
  console.log('\n--- Competitor intel');
  console.log(JSON.stringify(intel, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
