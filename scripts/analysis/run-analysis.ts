#!/usr/bin/env tsx

/**
 * Command-line entry point for the feed analyzer
 * Loads environment variables, wires the collaborators and prints results.
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';
import { parseArgs } from 'util';

// Find project root (go up two levels from scripts/analysis directory)
const projectRoot = path.resolve(__dirname, '../..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { RssFeedSource } from '../../src/adapters/rssFeedSource';
import { askQuestion } from '../../src/agents/askQuestion';
import { FeedAnalyzer } from '../../src/agents/feedAnalyzer';
import { PersonaStore } from '../../src/agents/personaStore';
import { runSingleAgent } from '../../src/agents/runAnalysis';
import { loadEnvironmentConfig } from '../../src/config/environment';
import type { EnvironmentConfig } from '../../src/config/environment';
import { parseRunWindow } from '../../src/config/runOptions';
import type { RunWindow } from '../../src/config/runOptions';
import { CacheStore } from '../../src/feeds/cacheStore';
import { FeedRegistry } from '../../src/feeds/feedRegistry';
import { PresetStore } from '../../src/feeds/presetStore';
import { DEFAULT_RETRY_POLICY } from '../../src/llm/callWithRetry';
import type { RetryPolicy } from '../../src/llm/callWithRetry';
import { createGateway } from '../../src/llm/createGateway';
import { writeReport } from '../../src/report/reportWriter';
import { logger } from '../../src/utils/logger';

const USAGE = `Usage: run-analysis <command> [options]

Commands:
  analyze [query]              Fetch, cluster and analyze feeds, then save a report
  ask <question>               Analyze a question on its own, without feeds
  fetch                        Fetch feeds (or reuse the cache) and list the articles
  feeds list                   List configured feeds
  feeds add <url>              Add a feed (--name, --tags)
  feeds remove <id|name|url>   Remove a feed
  presets list                 List saved presets
  presets save <name>          Save a preset (--tags, --query)
  presets delete <name>        Delete a preset
  personas list                List available personas
  personas show [name]         Print a persona's agents as JSON
  agent <role> <query>         Ask a single persona agent

Options:
  --since <24h|7d|2w|1m|today|yesterday|date>
  --tags <a,b>                 Only feeds carrying one of these tags
  --preset <name>              Use a saved preset
  --persona <name>             Persona to analyze with
  --max-agents <n>             Only run the first n agents (ask)
  --max-age <hours>            Reuse cached articles younger than this
  --no-cache                   Always fetch, never read or write the cache
`;

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    since: { type: 'string' },
    tags: { type: 'string' },
    preset: { type: 'string' },
    persona: { type: 'string' },
    name: { type: 'string' },
    query: { type: 'string' },
    'max-age': { type: 'string' },
    'max-agents': { type: 'string' },
    'no-cache': { type: 'boolean', default: false },
    help: { type: 'boolean', short: 'h', default: false }
  }
});

function splitTags(raw: string | undefined): string[] {
  return (raw ?? '').split(',').map((tag) => tag.trim()).filter(Boolean);
}

function retryPolicy(config: EnvironmentConfig): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, maxAttempts: config.llm?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts };
}

function runWindow(): RunWindow | null {
  const parsed = parseRunWindow({ since: values.since, maxAge: values['max-age'] });
  if (!parsed.success) {
    console.error(`❌ ${parsed.error}`);
    return null;
  }
  return parsed.value;
}

async function buildAnalyzer(config: EnvironmentConfig): Promise<FeedAnalyzer> {
  const personas = new PersonaStore(config.paths.personasDir);
  return new FeedAnalyzer({
    source: new RssFeedSource(),
    registry: new FeedRegistry(config.paths.feedsFile),
    cache: new CacheStore(config.paths.cacheDir),
    presets: new PresetStore(config.paths.presetsDir),
    gateway: createGateway(config.llm),
    persona: await personas.load(values.persona ?? config.persona),
    feedTimeoutSeconds: config.feeds.timeoutSeconds,
    cacheMaxAgeHours: config.feeds.cacheMaxAgeHours,
    maxTokens: config.llm?.maxTokens,
    llmTimeoutSeconds: config.llm?.timeoutSeconds,
    agentTemperature: config.llm?.temperature,
    retryPolicy: retryPolicy(config),
    onProgress: (message) => console.log(`  ${message}`)
  });
}

async function analyze(config: EnvironmentConfig, query: string): Promise<number> {
  const range = runWindow();
  if (!range) return 1;

  console.log('🔍 Starting feed analysis\n');
  console.log('═'.repeat(80));

  const analyzer = await buildAnalyzer(config);
  const result = await analyzer.analyze({
    query,
    since: values.since,
    tags: splitTags(values.tags),
    preset: values.preset,
    useCache: !values['no-cache'],
    maxAgeHours: range.maxAgeHours
  });

  if (!result.success) {
    console.error(`\n❌ ${result.error}`);
    return 1;
  }

  const file = await writeReport(config.paths.reportsDir, result.report);
  console.log('\n' + '═'.repeat(80));
  console.log(result.report);
  console.log('═'.repeat(80));
  console.log(`📊 ${result.articleCount} articles in ${result.clusterCount} topic clusters`);
  console.log(`📄 Report saved to ${file}`);
  return 0;
}

async function ask(config: EnvironmentConfig, question: string): Promise<number> {
  if (!question.trim()) {
    console.error(USAGE);
    return 1;
  }
  const maxAgents = values['max-agents'] ? parseInt(values['max-agents'], 10) : undefined;
  if (maxAgents !== undefined && !(maxAgents > 0)) {
    console.error(`❌ Invalid --max-agents '${values['max-agents']}'. Use a positive whole number.`);
    return 1;
  }

  console.log('🔍 Starting analysis\n');
  console.log('═'.repeat(80));

  const persona = await new PersonaStore(config.paths.personasDir).load(values.persona ?? config.persona);
  const result = await askQuestion(question, {
    gateway: createGateway(config.llm),
    persona,
    maxAgents,
    maxTokens: config.llm?.maxTokens,
    timeoutSeconds: config.llm?.timeoutSeconds,
    agentTemperature: config.llm?.temperature,
    retryPolicy: retryPolicy(config),
    onProgress: (message) => console.log(`  ${message}`)
  });

  if (!result.success) {
    console.error(`\n❌ ${result.error}`);
    if (result.auditTrail) console.error(`\n${result.auditTrail}`);
    return 1;
  }

  const file = await writeReport(config.paths.reportsDir, result.report, new Date(), 'report');
  console.log('\n' + '═'.repeat(80));
  console.log(result.report);
  console.log('═'.repeat(80));
  console.log(`📄 Report saved to ${file}`);
  return 0;
}

async function showPersona(config: EnvironmentConfig, name: string | undefined): Promise<number> {
  const target = name ?? values.persona ?? config.persona;
  const persona = await new PersonaStore(config.paths.personasDir).find(target);
  if (!persona) {
    console.error(`❌ Persona not found: ${target}`);
    return 1;
  }
  console.log(JSON.stringify(persona, null, 2));
  return 0;
}

async function fetchArticles(config: EnvironmentConfig): Promise<number> {
  const range = runWindow();
  if (!range) return 1;

  const analyzer = await buildAnalyzer(config);
  const { articles, errors, fromCache } = await analyzer.loadArticles({
    since: range.since,
    tags: splitTags(values.tags),
    useCache: !values['no-cache'],
    maxAgeHours: range.maxAgeHours
  });

  for (const article of articles) {
    console.log(`- [${article.publishedAt ?? 'undated'}] ${article.title} (${article.feedName})`);
  }
  for (const error of errors) {
    console.warn(`⚠️  ${error.feed}: ${error.error}`);
  }
  console.log(`\n${articles.length} articles${fromCache ? ' (from cache)' : ''}`);
  return 0;
}

async function feeds(config: EnvironmentConfig, action: string | undefined, target: string | undefined): Promise<number> {
  const registry = new FeedRegistry(config.paths.feedsFile);

  switch (action) {
    case 'list': {
      const all = await registry.list();
      if (all.length === 0) console.log('No feeds configured.');
      for (const feed of all) {
        const tags = feed.tags.length > 0 ? ` [${feed.tags.join(', ')}]` : '';
        console.log(`${feed.id}  ${feed.name}  ${feed.url}${tags}`);
      }
      return 0;
    }
    case 'add':
    case 'remove': {
      if (!target) {
        console.error(USAGE);
        return 1;
      }
      const result =
        action === 'add'
          ? await registry.add(target, values.name, splitTags(values.tags))
          : await registry.remove(target);
      console.log(result.success ? `✅ ${result.message}` : `❌ ${result.message}`);
      return result.success ? 0 : 1;
    }
    default:
      console.error(USAGE);
      return 1;
  }
}

async function presets(config: EnvironmentConfig, action: string | undefined, name: string | undefined): Promise<number> {
  const store = new PresetStore(config.paths.presetsDir);

  if (action === 'list') {
    const names = await store.list();
    console.log(names.length > 0 ? names.join('\n') : 'No presets saved.');
    return 0;
  }
  if (action === 'save' && name) {
    await store.save(name, splitTags(values.tags), values.query ?? '');
    console.log(`✅ Saved preset: ${name}`);
    return 0;
  }
  if (action === 'delete' && name) {
    const deleted = await store.delete(name);
    console.log(deleted ? `✅ Deleted preset: ${name}` : `❌ Preset not found: ${name}`);
    return deleted ? 0 : 1;
  }

  console.error(USAGE);
  return 1;
}

async function askAgent(config: EnvironmentConfig, role: string | undefined, query: string): Promise<number> {
  if (!role || !query) {
    console.error(USAGE);
    return 1;
  }

  const persona = await new PersonaStore(config.paths.personasDir).load(values.persona ?? config.persona);
  const result = await runSingleAgent(role, { query }, {
    gateway: createGateway(config.llm),
    persona,
    maxTokens: config.llm?.maxTokens,
    timeoutSeconds: config.llm?.timeoutSeconds,
    retryPolicy: retryPolicy(config)
  });

  if (!result.success) {
    console.error(`❌ ${result.error}`);
    return 1;
  }
  console.log(result.output);
  return 0;
}

async function main() {
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    process.exit(values.help ? 0 : 1);
  }

  try {
    const config = loadEnvironmentConfig();
    logger.setLevel(config.logging.level);

    let code: number;
    switch (command) {
      case 'analyze':
        code = await analyze(config, values.query ?? rest.join(' '));
        break;
      case 'fetch':
        code = await fetchArticles(config);
        break;
      case 'feeds':
        code = await feeds(config, rest[0], rest[1]);
        break;
      case 'presets':
        code = await presets(config, rest[0], rest[1]);
        break;
      case 'ask':
        code = await ask(config, values.query ?? rest.join(' '));
        break;
      case 'personas':
        if (rest[0] === 'show') {
          code = await showPersona(config, rest[1]);
        } else if (rest[0] === 'list' || rest[0] === undefined) {
          console.log((await new PersonaStore(config.paths.personasDir).list()).join('\n'));
          code = 0;
        } else {
          console.error(USAGE);
          code = 1;
        }
        break;
      case 'agent':
        code = await askAgent(config, rest[0], rest.slice(1).join(' '));
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        console.error(USAGE);
        code = 1;
    }

    process.exit(code);
  } catch (error) {
    console.error('\n💥 COMMAND FAILED');
    console.error('═'.repeat(80));
    console.error('Error:', error);
    process.exit(1);
  }
}

void main();
