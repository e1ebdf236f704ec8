#!/usr/bin/env node
/**
 * sales-metrics CLI
 *
 * Commands:
 * - sales-metrics run              — Clean the data and compute every metric
 * - sales-metrics summary          — Show the cleaning report and dataset summary
 * - sales-metrics generate-sample  — Write a deterministic sample sales file
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from '../utils/config';
import { logger, setLogFile, setLogLevel } from '../utils/logger';
import { PipelineError, errorMessage } from '../utils/errors';
import { createPipeline } from '../pipeline';
import { metricsToJson, insightsToJson } from '../analytics/serialize';
import { valueOrNull, type Measure } from '../analytics/measure';
import { generateSampleData, sampleDataToCsv } from '../sample/generator';

const program = new Command();

const PIPELINE_LOG_FILE = join('logs', 'pipeline.log');

interface RunOptions {
  data?: string;
  out?: string;
  top?: number;
  save: boolean;
  json?: boolean;
  logFile: boolean;
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

function configFromProgram(overrides: Partial<AppConfig> = {}): AppConfig {
  const { config: configPath } = program.opts<{ config?: string }>();
  const config = { ...loadConfig({ configPath }), ...overrides };
  setLogLevel(config.logLevel);
  return config;
}

function pct(m: Measure): string {
  const value = valueOrNull(m);
  return value === null ? 'n/a' : `${value.toFixed(2)}%`;
}

function money(n: number): string {
  return n.toLocaleString('en-US', { style: 'currency', currency: 'USD', maximumFractionDigits: 0 });
}

program
  .name('sales-metrics')
  .description('Clean sales transactions and derive trend, elasticity and performance metrics')
  .version('0.1.0')
  .option('-c, --config <file>', 'JSON config file');

// ============================================================================
// run — Full pipeline
// ============================================================================
program
  .command('run')
  .description('Clean the sales data and compute all metrics')
  .option('-d, --data <file>', 'Sales CSV file (overrides config)')
  .option('-o, --out <dir>', 'Output directory (overrides config)')
  .option('-t, --top <n>', 'Number of top performers', parsePositiveInt)
  .option('--no-save', 'Do not write the cleaned CSV')
  .option('--json', 'Print the full metrics as JSON')
  .option('--no-log-file', 'Do not write logs/pipeline.log under the output directory')
  .action((options: RunOptions) => {
    const overrides: Partial<AppConfig> = {};
    if (options.out) overrides.outputDir = options.out;
    if (options.top !== undefined) overrides.topN = options.top;
    const config = configFromProgram(overrides);
    if (options.logFile) {
      setLogFile(join(config.outputDir, PIPELINE_LOG_FILE));
    }

    const result = createPipeline(config).run({ dataFile: options.data, saveCleaned: options.save });

    if (options.json) {
      const payload = {
        summary: result.summary,
        report: result.dataset.report,
        metrics: metricsToJson(result.metrics),
        insights: insightsToJson(result.insights),
        cleanedPath: result.cleanedPath,
      };
      console.log(JSON.stringify(payload, null, 2));
      return;
    }

    const { summary, metrics, insights } = result;
    const growth = metrics.trends.overallGrowth;
    console.log('\n\x1b[1mSales Metrics\x1b[0m\n');
    console.log(`  Rows:            ${summary.totalRows} (${summary.products} products)`);
    if (summary.dateRange) {
      console.log(`  Period:          ${summary.dateRange.start} to ${summary.dateRange.end}`);
    }
    console.log(`  Units sold:      ${summary.totalUnitsSold.toLocaleString('en-US')}`);
    console.log(`  Revenue:         ${money(summary.totalRevenue)}`);
    console.log('\n  Growth:');
    console.log(`    Monthly units:   ${pct(growth.avgMonthlyUnitsGrowth)}`);
    console.log(`    Monthly revenue: ${pct(growth.avgMonthlyRevenueGrowth)}`);
    console.log(`    YoY units:       ${pct(growth.avgYoyUnitsGrowth)}`);
    console.log(`    YoY revenue:     ${pct(growth.avgYoyRevenueGrowth)}`);
    console.log('\n  Leaders:');
    console.log(`    Best selling:    ${metrics.performance.leaders.bestSelling ?? 'n/a'}`);
    console.log(`    Highest revenue: ${metrics.performance.leaders.highestRevenue ?? 'n/a'}`);
    console.log(`    Most stable:     ${metrics.performance.leaders.mostStable ?? 'n/a'}`);
    console.log('\n  Top performers:');
    for (const row of metrics.performance.topPerformers) {
      console.log(
        `    #${row.revenueRank} ${row.productId}  ${money(row.totalRevenue)}  share ${row.marketShare.toFixed(1)}%`,
      );
    }
    console.log(
      `\n  Elastic products: ${insights.elasticProducts.length > 0 ? insights.elasticProducts.join(', ') : 'none'}`,
    );
    if (result.cleanedPath) {
      console.log(`  Cleaned data:     ${result.cleanedPath}`);
    }
    console.log('');
  });

// ============================================================================
// summary — Cleaning report and dataset summary
// ============================================================================
program
  .command('summary')
  .description('Show the cleaning report and dataset summary')
  .option('-d, --data <file>', 'Sales CSV file (overrides config)')
  .action((options: { data?: string }) => {
    const config = configFromProgram();
    const { dataset, summary } = createPipeline(config).prepare({ dataFile: options.data });

    console.log('\n\x1b[1mCleaning Report\x1b[0m\n');
    console.log(`  Input rows:  ${dataset.report.inputRows}`);
    for (const step of dataset.report.steps) {
      const dropped = step.dropped > 0 ? `\x1b[33m-${step.dropped}\x1b[0m` : '\x1b[90m0\x1b[0m';
      console.log(`    ${step.step.padEnd(18)} ${dropped}`);
    }
    console.log(`  Output rows: ${dataset.report.outputRows}\n`);
    console.log(JSON.stringify(summary, null, 2));
  });

// ============================================================================
// generate-sample — Deterministic sample data
// ============================================================================
program
  .command('generate-sample')
  .description('Write a deterministic sample sales CSV')
  .option('-m, --months <n>', 'Months of data', parsePositiveInt, 24)
  .option('-s, --seed <n>', 'Random seed', parseInteger, 42)
  .option('-o, --out <file>', 'Output file (defaults to the configured data file)')
  .action((options: { months: number; seed: number; out?: string }) => {
    const config = configFromProgram();
    const target = options.out ?? config.dataFile;
    const table = generateSampleData({ months: options.months, seed: options.seed });

    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, sampleDataToCsv(table), 'utf-8');
    logger.info({ path: target, rows: table.rows.length }, 'Sample data written');
    console.log(`Sample data saved to: ${target} (${table.rows.length} rows)`);
  });

try {
  program.parse();
} catch (err) {
  const code = err instanceof PipelineError ? err.code : 'UNEXPECTED';
  logger.error({ code, error: errorMessage(err) }, 'Command failed');
  console.error(`\nERROR: ${errorMessage(err)}`);
  process.exitCode = 1;
}
