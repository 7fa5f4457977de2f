/**
 * `ablate analyze`: summarise a run CSV, gate the candidates and write reports.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig, toGatePolicy } from '../../core/config/loader.js';
import { summarizeByCondition } from '../../core/analysis/aggregate.js';
import { evaluateAdoption } from '../../core/analysis/ranker.js';
import { loadAnalysisRecords } from '../../core/trials/codec.js';
import { writeConditionSummaryCsv, writeReports } from '../../core/report/writer.js';
import { createFormatter } from '../formatters/index.js';
import { fileExists } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger, resolveLogLevel } from '../../utils/logger.js';

interface AnalyzeCommandOptions {
  input?: string;
  reportDir?: string;
  summaryCsv?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Summarise a run CSV, evaluate adoption gates and write reports')
    .option('--input <path>', 'Run CSV (default: data/runs_latest.csv)')
    .option('--report-dir <path>', 'Directory for Markdown reports')
    .option('--summary-csv <path>', 'Condition summary CSV (default: <report-dir>/charts/condition_summary_latest.csv)')
    .option('--config <path>', 'Config file (default: .ablate/config.yaml)')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Show every gate metric')
    .action(async (options: AnalyzeCommandOptions) => {
      try {
        await runAnalyze(options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runAnalyze(options: AnalyzeCommandOptions): Promise<void> {
  logger.setLevel(resolveLogLevel(options));
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const { analysis } = config;

  const inputPath = path.resolve(projectRoot, options.input ?? analysis.input);
  if (!(await fileExists(inputPath))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Input CSV does not exist: ${inputPath}`, { path: inputPath });
  }
  const reportDir = path.resolve(projectRoot, options.reportDir ?? analysis.report_dir);
  const summaryCsvPath = path.resolve(
    projectRoot,
    options.summaryCsv ?? analysis.summary_csv ?? path.join(reportDir, 'charts', 'condition_summary_latest.csv')
  );

  const records = await loadAnalysisRecords(inputPath);
  const policy = toGatePolicy(analysis);
  const summaries = summarizeByCondition(records);
  const decision = evaluateAdoption(records, policy);

  await writeConditionSummaryCsv(summaries, summaryCsvPath);
  const written = await writeReports(
    summaries,
    decision,
    { inputPath, rowCount: records.length, generatedAt: new Date(), policy },
    reportDir
  );
  logger.debug('Wrote report files', { files: written });

  const formatter = createFormatter({ format: options.json ? 'json' : 'human', verbose: options.verbose });
  console.log(formatter.formatAnalysis({ inputPath, rowCount: records.length, summaries, decision, policy }));

  logger.success(`Wrote summary CSV: ${summaryCsvPath}`);
  logger.success(`Wrote reports to: ${reportDir}`);
}
