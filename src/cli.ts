#!/usr/bin/env node

/**
 * CLI Entry Point
 *
 * Command-line interface for generating Copilot usage metrics reports.
 * Imports functionality from the library entry point.
 *
 * Usage: npm run report -- [--day YYYY-MM-DD] [--users] [--seats] [--breakdown] ...
 */

import 'dotenv/config';
import {
  loadConfig,
  parseDate,
  runReports,
  formatRunSummary,
  isOutputFormat,
  MetricsApiError,
  type ConfigOverrides,
  type ReportRequest,
} from './index.js';

const USAGE =
  'Usage: npm run report -- [options]\n' +
  '  --day YYYY-MM-DD           Report for a single day (default: latest 28 days)\n' +
  '  --users                    Include per-user metrics\n' +
  '  --seats                    List users with an assigned Copilot seat\n' +
  '  --breakdown                Per-user usage breakdown against the included requests\n' +
  '  --enterprise               Enterprise-level metrics (needs GITHUB_ENTERPRISE)\n' +
  '  --billing                  Copilot billing summary\n' +
  '  --format json|csv|excel    Output format (default: json, or OUTPUT_FORMAT)\n' +
  '  --output DIR               Output directory (default: ./reports, or OUTPUT_DIR)\n' +
  '  --org ORG                  GitHub organization (default: GITHUB_ORG)\n' +
  '  --token TOKEN              GitHub token (default: GITHUB_TOKEN)\n' +
  'Example: npm run report -- --day 2026-01-15 --users --format csv';

const BOOLEAN_FLAGS = ['--users', '--seats', '--breakdown', '--enterprise', '--billing', '--help'] as const;
const VALUE_FLAGS = ['--day', '--format', '--output', '--org', '--token'] as const;

type BooleanFlag = (typeof BOOLEAN_FLAGS)[number];
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isBooleanFlag(arg: string): arg is BooleanFlag {
  return (BOOLEAN_FLAGS as readonly string[]).includes(arg);
}

function isValueFlag(arg: string): arg is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(arg);
}

export interface ParsedArguments {
  help: boolean;
  request: ReportRequest;
  overrides: ConfigOverrides;
}

export function parseArguments(): ParsedArguments {
  const args = process.argv.slice(2);
  const switches = new Set<BooleanFlag>();
  const values = new Map<ValueFlag, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isBooleanFlag(arg)) {
      switches.add(arg);
    } else if (isValueFlag(arg)) {
      const value = args[i + 1];
      if (value == null || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}\n${USAGE}`);
      }
      values.set(arg, value);
      i++;
    } else {
      throw new Error(`Invalid argument: ${arg}\n${USAGE}`);
    }
  }

  const format = values.get('--format');
  if (format != null && !isOutputFormat(format.toLowerCase())) {
    throw new Error(`Invalid --format: ${format}. Use json, csv or excel.\n${USAGE}`);
  }

  const day = values.get('--day');
  if (day != null) {
    parseDate(day);
  }

  return {
    help: switches.has('--help'),
    request: {
      day,
      users: switches.has('--users'),
      seats: switches.has('--seats'),
      breakdown: switches.has('--breakdown'),
      enterprise: switches.has('--enterprise'),
      billing: switches.has('--billing'),
    },
    overrides: {
      token: values.get('--token'),
      org: values.get('--org'),
      format,
      outputDir: values.get('--output'),
      enterprise: switches.has('--enterprise'),
    },
  };
}

function printBanner(org: string, outputDir: string, format: string) {
  console.log('\n' + '='.repeat(60));
  console.log('🚀 GitHub Copilot Usage Metrics Report Generator');
  console.log('='.repeat(60));
  console.log(`📁 Organization: ${org}`);
  console.log(`📂 Output directory: ${outputDir}`);
  console.log(`📄 Format: ${format}`);
  console.log('='.repeat(60) + '\n');
}

async function main() {
  process.on('SIGINT', () => {
    console.log('\n⚠️  Cancelled by user');
    process.exit(0);
  });

  try {
    const { help, request, overrides } = parseArguments();
    if (help) {
      console.log(USAGE);
      return;
    }

    const config = loadConfig(overrides);
    printBanner(config.org, config.outputDir, config.format);

    const artifacts = await runReports(config, request);
    console.log(formatRunSummary(artifacts));
  } catch (error) {
    if (error instanceof MetricsApiError) {
      console.error(`❌ ${error.message}`);
      for (const hint of error.hints) {
        console.error(`   ${hint}`);
      }
    } else if (error instanceof Error) {
      console.error('❌ Error:', error.message);
      if (error.message.includes('GITHUB_TOKEN')) {
        console.error('\nHint: Set GITHUB_TOKEN in your environment or .env file, or pass --token.');
      } else if (error.message.includes('GITHUB_ORG')) {
        console.error('\nHint: Set GITHUB_ORG in your environment or .env file, or pass --org.');
      }
    } else {
      console.error('❌ Unexpected error:', error);
    }
    process.exit(1);
  }
}

if (!process.env.VITEST) {
  main().catch((error) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
}
