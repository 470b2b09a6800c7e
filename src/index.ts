#!/usr/bin/env node
// ============================================================================
// FILE: src/index.ts
// PURPOSE: CLI entry point for SARA retrieval
// ============================================================================

import 'dotenv/config';
import { Command } from 'commander';
import { askWithContext } from './answer.js';
import { loadConfig, type SaraConfig } from './config.js';
import { createEmbeddingProvider } from './embeddings.js';
import { getErrorMessage } from './errors.js';
import { runEvaluation } from './evaluation.js';
import { createChatClient } from './llm-client.js';
import { setLogLevel } from './logger.js';
import { calculateIndexStats, formatIndexStats, formatSearchResults } from './output.js';
import { buildIndexFromFile } from './retrieval/builder.js';
import { loadIndex } from './retrieval/persistence.js';
import { searchWithDistances } from './retrieval/search.js';
import { createApp, startServer } from './server.js';

const program = new Command();

program
  .name('sara')
  .description('Retrieval-augmented question answering over researcher records')
  .version('1.0.0');

/**
 * setup - Load configuration and apply the log level
 */
function setup(): SaraConfig {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return config;
}

function fail(err: unknown): never {
  console.error('\n❌ Error:', getErrorMessage(err));
  process.exit(1);
}

function parseTopK(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value);
}

function progressBar(cur: number, total: number): string {
  const pct = Math.round((cur / total) * 100);
  return `[${'█'.repeat(Math.floor(pct / 5))}${'░'.repeat(20 - Math.floor(pct / 5))}] ${pct}% (${cur}/${total})`;
}

// ============================================================================
// BUILD COMMAND
// ============================================================================

program
  .command('build')
  .description('Embed researcher records and write the vector index')
  .argument('[data-path]', 'JSON array of researcher records (default: DATA_PATH)')
  .option('-o, --output <path>', 'Index path (default: INDEX_PATH)')
  .action(async (dataPath: string | undefined, opts: { output?: string }) => {
    try {
      const config = setup();
      const source = dataPath ?? config.dataPath;
      const target = opts.output ?? config.indexPath;

      console.log('\n🔧 Building vector index\n');
      const provider = createEmbeddingProvider(config);
      const summary = await buildIndexFromFile(source, target, provider, {
        currency: config.currency,
        onProgress: (cur, total) => process.stdout.write(`\r   ${progressBar(cur, total)}`),
      });
      console.log('\n');

      console.log(`
📊 Build Summary
═══════════════════════════════
Records indexed:   ${summary.count}
Records skipped:   ${summary.skipped.length}
Vector dimension:  ${summary.dimension}
Embedding model:   ${summary.model}
Index file:        ${summary.indexPath}
Metadata file:     ${summary.metadataPath}
`);
      console.log('✅ Done!\n');
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// SEARCH COMMAND
// ============================================================================

program
  .command('search')
  .description('Find the researchers nearest to a query')
  .argument('<query>', 'Natural-language query')
  .option('-i, --index <path>', 'Index path (default: INDEX_PATH)')
  .option('-k, --top-k <n>', 'Number of results (default: TOP_K)')
  .option('--json', 'Print results as JSON')
  .action(async (query: string, opts: { index?: string; topK?: string; json?: boolean }) => {
    try {
      const config = setup();
      if (opts.json) setLogLevel('warn');

      const provider = createEmbeddingProvider(config);
      const results = await searchWithDistances(
        query,
        opts.index ?? config.indexPath,
        parseTopK(opts.topK, config.topK),
        provider
      );

      if (opts.json) {
        console.log(JSON.stringify(results.map(r => r.record), null, 2));
      } else {
        console.log(`\n${formatSearchResults(query, results, config.currency)}\n`);
      }
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// ASK COMMAND
// ============================================================================

program
  .command('ask')
  .description('Answer a question using retrieved researcher context')
  .argument('<question>', 'Question to answer')
  .option('-i, --index <path>', 'Index path (default: INDEX_PATH)')
  .option('-k, --top-k <n>', 'Records to retrieve (default: TOP_K)')
  .option('--show-context', 'Print the context sent to the model')
  .action(async (question: string, opts: { index?: string; topK?: string; showContext?: boolean }) => {
    try {
      const config = setup();
      console.log(`\n🔎 Searching context for: ${question}`);

      const result = await askWithContext(
        question,
        {
          embeddings: createEmbeddingProvider(config),
          chat: createChatClient(config),
          indexPath: opts.index ?? config.indexPath,
        },
        {
          topK: parseTopK(opts.topK, config.topK),
          maxContextChars: config.maxContextChars,
          currency: config.currency,
        }
      );

      if (opts.showContext) {
        console.log(`\n── Context ──\n${result.context}\n`);
      }
      console.log(`\n${result.answer}\n`);
      console.log(`Sources: ${result.records.map(r => r.name).join(', ') || '(none)'}\n`);
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// EVALUATE COMMAND
// ============================================================================

program
  .command('evaluate')
  .description('Score RAG answers against a no-context baseline with an LLM judge')
  .argument('<questions-path>', 'Text file, one question per line')
  .option('-i, --index <path>', 'Index path (default: INDEX_PATH)')
  .option('-o, --output <path>', 'CSV report path', './output/evaluation.csv')
  .option('-k, --top-k <n>', 'Records to retrieve (default: TOP_K)')
  .action(async (questionsPath: string, opts: { index?: string; output: string; topK?: string }) => {
    try {
      const config = setup();
      console.log('\n🧪 Running evaluation\n');

      const summary = await runEvaluation(
        questionsPath,
        opts.output,
        {
          embeddings: createEmbeddingProvider(config),
          chat: createChatClient(config),
          indexPath: opts.index ?? config.indexPath,
        },
        {
          topK: parseTopK(opts.topK, config.topK),
          maxContextChars: config.maxContextChars,
          currency: config.currency,
        }
      );

      console.log(`\n💾 Report: ${summary.reportPath}`);
      console.log(`   ${summary.answered}/${summary.total} answered, ${summary.failed} failed\n`);
      if (summary.failed > 0) process.exitCode = 1;
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// STATS COMMAND
// ============================================================================

program
  .command('stats')
  .description('Show statistics for a persisted index')
  .option('-i, --index <path>', 'Index path (default: INDEX_PATH)')
  .action(async (opts: { index?: string }) => {
    try {
      const config = setup();
      const { index, metadata } = await loadIndex(opts.index ?? config.indexPath);
      const stats = calculateIndexStats(metadata, index.dimension, index.model);
      console.log(formatIndexStats(stats, config.currency));
    } catch (err) {
      fail(err);
    }
  });

// ============================================================================
// SERVE COMMAND
// ============================================================================

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <n>', 'Port (default: PORT)')
  .option('-i, --index <path>', 'Index path (default: INDEX_PATH)')
  .action(async (opts: { port?: string; index?: string }) => {
    try {
      const config = setup();
      const port = opts.port === undefined ? config.port : Number(opts.port);

      const app = createApp({
        embeddings: createEmbeddingProvider(config),
        chat: createChatClient(config),
        indexPath: opts.index ?? config.indexPath,
        topK: config.topK,
        maxContextChars: config.maxContextChars,
        currency: config.currency,
      });

      await startServer(app, port);
      console.log(`\n🚀 SARA API listening on http://localhost:${port}\n`);
    } catch (err) {
      fail(err);
    }
  });

// Parse command line arguments
program.parseAsync().catch(fail);
