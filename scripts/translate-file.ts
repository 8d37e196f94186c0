#!/usr/bin/env tsx
/**
 * Translate one CSV file from the command line
 *
 * Usage: tsx scripts/translate-file.ts <input.csv> <output.csv> <sourceLang> <targetLang,...>
 */

import { loadConfig } from '../src/config.js';
import { runTranslationJob } from '../src/orchestrator.js';
import { SettingsStore } from '../src/settings.js';
import { DeeplTranslator } from '../src/translator.js';

async function main() {
  const [inputPath, outputPath, sourceLang, targets] = process.argv.slice(2);

  if (!inputPath || !outputPath || !sourceLang || !targets) {
    console.error('Usage: tsx scripts/translate-file.ts <input.csv> <output.csv> <sourceLang> <targetLang,...>');
    process.exit(1);
  }

  const config = loadConfig();
  const stored = await new SettingsStore(config.settingsPath).load();
  const credential = stored.credential || config.deeplApiKey;

  if (!credential) {
    console.error('❌ No API key: set DEEPL_API_KEY or save one through POST /credential');
    process.exit(1);
  }

  console.log(`🔄 Translating ${inputPath} (${sourceLang} -> ${targets})...\n`);

  const outcome = await runTranslationJob(
    {
      inputPath,
      outputPath,
      sourceLang,
      targetLangs: targets.split(',').map((code) => code.trim()).filter(Boolean),
      credential,
      concurrency: config.concurrency,
    },
    {
      translator: new DeeplTranslator({ apiUrl: config.deeplApiUrl, timeoutMs: config.deeplTimeoutMs }),
      retry: config.retry,
    }
  );

  if (outcome.status !== 'completed') {
    console.error(`\n❌ Job ${outcome.status}${outcome.status === 'failed' ? `: [${outcome.error.kind}] ${outcome.error.message}` : ''}`);
    process.exit(1);
  }

  const { summary } = outcome;
  console.log('\n✅ Translation completed\n');
  console.log('═'.repeat(80));
  console.log(`  Rows:              ${summary.rows}`);
  console.log(`  Translated cells:  ${summary.translatedCells}`);
  console.log(`  Skipped cells:     ${summary.skippedCells}`);
  console.log(`  Failed cells:      ${summary.failedCells}`);
  for (const failure of summary.failures) {
    console.log(`    - ${failure.key} [${failure.targetLang}] ${failure.kind}: ${failure.message}`);
  }
  console.log(`  Duration:          ${(summary.durationMs / 1000).toFixed(2)}s`);
  console.log('═'.repeat(80));
  console.log(`\n💾 Output written: ${summary.outputPath}`);
}

main().catch((error) => {
  console.error('\n❌ ERROR:', error);
  process.exit(1);
});
