#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import readline from 'node:readline';
import { getDefaultConfigPath, loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { InsufficientContentError, PipelineCancelledError, VcpodError, errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { loadSourceRegistry } from '../source/registry.js';
import type { SourceDescriptor } from '../source/types.js';
import { collectCorpus, type CollectionReport } from '../engine/collect.js';
import { renderCorpus, sourcesRepresented, type Corpus } from '../engine/aggregate.js';
import { calculateWindow } from '../engine/timeFilter.js';
import { runPodcast } from '../engine/podcast.js';
import { LlmClient } from '../llm/client.js';
import { SpeechClient } from '../audio/tts.js';

const DEFAULT_TOPIC = 'artificial intelligence';
const WEEK_CHOICES = [1, 2, 3] as const;

const program = new Command();

program
  .name('vcpod')
  .description('Turn recent venture-capital blog posts into a narrated podcast episode')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create ~/.vcpod/config.yaml with default settings')
  .action(() => {
    const configPath = getDefaultConfigPath();
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
    log('  Set llm.api_key and tts.api_key (or VCPOD_LLM_API_KEY / VCPOD_TTS_API_KEY) before generating.');
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, source registry, API keys and output directory')
  .action(async () => {
    const results: string[] = [];
    try {
      const config = await loadConfig();
      results.push('Config: ok');

      try {
        const sources = loadSourceRegistry(config.sources_file);
        results.push(`Sources: ${sources.length}`);
      } catch (err) {
        results.push(`Sources: error (${errorMessage(err)})`);
      }

      results.push(new LlmClient(config.llm).isConfigured() ? 'LLM: configured' : 'LLM: (unconfigured)');
      results.push(new SpeechClient(config.tts).isConfigured() ? 'TTS: configured' : 'TTS: (unconfigured)');

      const outputDir = resolvePath(config.output.dir);
      try {
        fs.accessSync(outputDir, fs.constants.W_OK);
        results.push(`Output: ${outputDir}`);
      } catch {
        results.push(`Output: ${outputDir} not writable (will fall back to ${process.cwd()})`);
      }
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
    }

    log(`✓ ${results.join(' | ')}`);
  });

// === sources ===
program
  .command('sources')
  .description('List the configured source registry')
  .action(async () => {
    await withErrors(async () => {
      const config = await loadConfig();
      const sources = loadSourceRegistry(config.sources_file);
      for (const s of sources) {
        const fallback = s.fallback_url ? `  fallback: ${s.fallback_url}` : '';
        log(`${s.name.padEnd(22)} ${s.strategy.padEnd(13)} ${s.url}${fallback}`);
      }
      log(`\n${sources.length} sources total`);
    });
  });

// === collect ===
program
  .command('collect')
  .description('Scrape, filter and deduplicate posts without generating audio')
  .option('-d, --days <n>', 'Lookback window in days', parsePositiveInt)
  .option('-w, --weeks <n>', 'Lookback window in weeks', parsePositiveInt)
  .option('--json', 'Print the corpus as JSON', false)
  .option('-o, --out <file>', 'Write the rendered corpus to a file')
  .action(async (opts: { days?: number; weeks?: number; json: boolean; out?: string }) => {
    await withErrors(async () => {
      const { config, sources } = await bootstrap();
      const days = opts.days ?? (opts.weeks ?? 1) * 7;
      const controller = cancelOnSigint();

      const { corpus, report } = await collectCorpus(sources, config, {
        window: calculateWindow(days),
        signal: controller.signal,
      });

      if (opts.json) {
        log(JSON.stringify({ corpus, report }, null, 2));
        return;
      }

      printReport(corpus, report);
      const rendered = renderCorpus(corpus);
      if (opts.out) {
        const target = resolvePath(opts.out);
        fs.writeFileSync(target, rendered, 'utf-8');
        log(`\n✓ Corpus written to: ${target}`);
      } else {
        log(`\n${rendered}`);
      }
    });
  });

// === generate ===
program
  .command('generate', { isDefault: true })
  .description('Generate a podcast episode from recent VC blog posts')
  .option('-w, --weeks <n>', 'Lookback window: 1, 2 or 3 weeks', parseWeeks)
  .option('-t, --topic <topic>', 'Topic of interest')
  .option('-y, --yes', 'Skip the confirmation prompt', false)
  .action(async (opts: { weeks?: number; topic?: string; yes: boolean }) => {
    await withErrors(async () => {
      const { config, sources } = await bootstrap();

      const llm = new LlmClient(config.llm);
      const speech = new SpeechClient(config.tts);
      if (!llm.isConfigured() || !speech.isConfigured()) {
        log('❌ Configuration Error: API keys missing.');
        log('   Set llm.api_key and tts.api_key in ~/.vcpod/config.yaml');
        log('   or export VCPOD_LLM_API_KEY / VCPOD_TTS_API_KEY. Run `vcpod init` to create the file.');
        process.exitCode = 1;
        return;
      }

      log('='.repeat(60));
      log('🎙️  VC Podcast Generator');
      log('='.repeat(60));

      const weeks = opts.weeks ?? (await promptWeeks());
      const topic = opts.topic?.trim() || (await promptTopic());

      log('\n⚙️  Configuration:');
      log(`   Time period: ${weeks * 7} days`);
      log(`   Topic:       ${topic}`);
      log(`   Output:      ${resolvePath(config.output.dir)}`);

      if (!opts.yes && !(await confirm('\n▶️  Start generating podcast? [Y/n] '))) {
        log('❌ Cancelled.');
        return;
      }

      log('\n🚀 Starting podcast generation...\n');
      const controller = cancelOnSigint();
      const result = await runPodcast(
        { config, sources, llm, speech },
        { days: weeks * 7, topic, signal: controller.signal, onStage: displayProgress },
      );

      log('\n✅ Success! Podcast saved to:');
      log(`   ${result.path}`);
      log(
        `   ${result.corpus.documents.length} posts from ${sourcesRepresented(result.corpus).length} sources, ` +
          `${result.script_words} words (~${result.estimated_minutes.toFixed(1)} min)`,
      );
    });
  });

async function bootstrap(): Promise<{ config: Config; sources: readonly SourceDescriptor[] }> {
  const config = await loadConfig();
  const sources = loadSourceRegistry(config.sources_file);
  return { config, sources };
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

function parseWeeks(value: string): number {
  const n = parsePositiveInt(value);
  if (!WEEK_CHOICES.some((w) => w === n)) {
    throw new InvalidArgumentError('Must be 1, 2 or 3.');
  }
  return n;
}

function cancelOnSigint(): AbortController {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    log('\n⏹  Cancelling...');
    controller.abort();
  });
  return controller;
}

function ask(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function confirm(question: string): Promise<boolean> {
  return (await ask(question)).toLowerCase() !== 'n';
}

async function promptWeeks(): Promise<number> {
  log('\n🔍 Select time period to analyze:');
  for (const w of WEEK_CHOICES) log(`  ${w}) ${w} week${w === 1 ? '' : 's'}`);
  const answer = await ask('Enter your choice [1]: ');
  const n = Number.parseInt(answer, 10);
  return WEEK_CHOICES.some((w) => w === n) ? n : 1;
}

async function promptTopic(): Promise<string> {
  const answer = await ask(`\n📝 Enter topic of interest [${DEFAULT_TOPIC}]: `);
  return answer || DEFAULT_TOPIC;
}

function displayProgress(step: string, current: number, total: number): void {
  const percentage = Math.floor((current / total) * 100);
  const barLength = 30;
  const filled = Math.floor((percentage / 100) * barLength);
  const bar = '█'.repeat(filled) + '░'.repeat(barLength - filled);
  process.stdout.write(`\r[${bar}] ${percentage}% - ${step}`.padEnd(70));
  if (current === total) process.stdout.write('\n');
}

function printReport(corpus: Corpus, report: CollectionReport): void {
  log('Collection complete:');
  log(`  Sources attempted:  ${corpus.sources_attempted}`);
  log(`  Sources succeeded:  ${corpus.sources_succeeded}`);
  log(`  Sources failed:     ${corpus.sources_failed}`);
  log(`  Posts extracted:    ${report.documents_extracted}`);
  log(`  Dateless dropped:   ${report.dateless_dropped}`);
  log(`  Outside window:     ${report.outside_window}`);
  log(`  Duplicates removed: ${corpus.duplicates_removed}`);
  log(`  Posts in corpus:    ${corpus.documents.length}`);
  log(`  Duration:           ${report.duration_ms}ms`);

  if (corpus.failures.length > 0) {
    log('\nFailures:');
    for (const f of corpus.failures) log(`  ${f.source_name}: ${f.reason}`);
  }
}

async function withErrors(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    process.exitCode = 1;
    if (err instanceof InsufficientContentError) {
      const c = err.counts;
      log(`\n❌ Not enough content: ${err.message}.`);
      log(`   ${c.sources_succeeded}/${c.sources_attempted} sources fetched, ${c.documents} posts kept.`);
      log('   Try a wider time window (e.g. --weeks 3) or a broader topic.');
    } else if (err instanceof PipelineCancelledError) {
      log(`\n❌ ${err.message}.`);
      process.exitCode = 130;
    } else if (err instanceof VcpodError) {
      log(`\n❌ ${err.name}: ${err.message}`);
      if (err.details) log(`   ${JSON.stringify(err.details)}`);
    } else {
      throw err;
    }
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Unexpected error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
