#!/usr/bin/env tsx
/**
 * Check a DeepL API key (argument, DEEPL_API_KEY, or the saved one)
 */

import { loadConfig, resolveDeeplApiUrl } from '../src/config.js';
import { errorMessage } from '../src/errors.js';
import { SettingsStore } from '../src/settings.js';
import { DeeplTranslator } from '../src/translator.js';

async function main() {
  const config = loadConfig();
  const stored = await new SettingsStore(config.settingsPath).load();
  const apiKey = process.argv[2] || config.deeplApiKey || stored.credential;

  if (!apiKey) {
    console.error('❌ API key not provided');
    process.exit(1);
  }

  console.log(`🧪 Checking API key against ${resolveDeeplApiUrl(apiKey, config.deeplApiUrl)}...\n`);

  try {
    await new DeeplTranslator({ apiUrl: config.deeplApiUrl, timeoutMs: config.deeplTimeoutMs }).verifyCredential(apiKey);
    console.log('✅ API key is valid, connected to DeepL');
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('\n❌ ERROR:', error);
  process.exit(1);
});
