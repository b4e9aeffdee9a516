#!/usr/bin/env tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile, mkdir, access, constants } from 'fs/promises';
import { resolve, dirname, basename, extname, join } from 'path';
import { extractPdfLines } from '@edocta/pdf-extract';
import { parseStatement, detectAccountType, type StatementParseResult } from '@edocta/statement-parser';
import { computeTotals, exportCsv, exportTotalsCsv, exportXlsx } from '@edocta/output';
import {
  AccountTypeSchema,
  StatementOutputSchema,
  PARSER_VERSION,
  INSTITUTION_NAME,
  formatCurrency,
  type AccountType,
  type ParsedMovements,
  type StatementOutput,
  type StatementTotals,
} from '@edocta/types';

const AVAILABLE_FORMATS = ['xlsx', 'csv', 'json'] as const;
type OutputFormat = typeof AVAILABLE_FORMATS[number];

const ACCOUNT_TYPE_CHOICES = [...AccountTypeSchema.options, 'auto'] as const;

interface CliOptions {
  accountType: string;
  format: string;
  out?: string;
  verbose: boolean;
  strict: boolean;
  pretty: boolean;
}

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

program
  .name('edocta')
  .description(`Extract transactions from ${INSTITUTION_NAME} statement PDFs into spreadsheets`)
  .version(PARSER_VERSION)
  .argument('<pdf-file>', 'Path to the statement PDF')
  .option(
    '-t, --account-type <type>',
    `Statement layout (${ACCOUNT_TYPE_CHOICES.join(', ')})`,
    process.env['EDOCTA_ACCOUNT_TYPE'] ?? 'debito'
  )
  .option(
    '-f, --format <format>',
    `Output format (${AVAILABLE_FORMATS.join(', ')})`,
    process.env['EDOCTA_FORMAT'] ?? 'xlsx'
  )
  .option('-o, --out <file>', 'Output file path (default: stdout for csv and json)', process.env['EDOCTA_OUTPUT_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('EDOCTA_VERBOSE', false))
  .option('-s, --strict', 'Validate JSON output against the schema before writing', envBool('EDOCTA_STRICT', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('EDOCTA_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .action(async (pdfFile: string, options: CliOptions) => {
    try {
      await processFile(pdfFile, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

function isOutputFormat(value: string): value is OutputFormat {
  return AVAILABLE_FORMATS.some(format => format === value);
}

function resolveAccountType(requested: string, lines: readonly string[], verbose: boolean): AccountType {
  if (requested === 'auto') {
    const detected = detectAccountType(lines);
    if (detected === null) {
      throw new Error('Could not detect the statement layout; pass --account-type debito or credito');
    }
    if (verbose) {
      console.error(`[INFO] Detected account type: ${detected}`);
    }
    return detected;
  }

  const parsed = AccountTypeSchema.safeParse(requested);
  if (!parsed.success) {
    throw new Error(`Invalid account type: ${requested}. Valid types: ${ACCOUNT_TYPE_CHOICES.join(', ')}`);
  }
  return parsed.data;
}

function toMovements(result: StatementParseResult): ParsedMovements {
  return result.accountType === 'debito'
    ? { accountType: result.accountType, transactions: result.transactions }
    : { accountType: result.accountType, transactions: result.transactions };
}

function printTotals(accountType: AccountType, totals: StatementTotals): void {
  const abonos = `[INFO] Total abonos: ${formatCurrency(totals.totalAbonos)}`;
  const cargos = `[INFO] Total cargos: ${formatCurrency(totals.totalCargos)}`;
  if (accountType === 'debito') {
    console.error(abonos);
    console.error(cargos);
  } else {
    console.error(cargos);
    console.error(abonos);
  }
}

async function writeOutput(outPath: string, content: string | Buffer): Promise<void> {
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, content);
}

function totalsPathFor(outPath: string): string {
  const ext = extname(outPath);
  return join(dirname(outPath), `${basename(outPath, ext)}.totales${ext || '.csv'}`);
}

async function processFile(pdfFile: string, options: CliOptions): Promise<void> {
  const filePath = resolve(pdfFile);

  if (!isOutputFormat(options.format)) {
    throw new Error(`Invalid format: ${options.format}. Valid formats: ${AVAILABLE_FORMATS.join(', ')}`);
  }
  const format = options.format;

  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new Error(`PDF not found: ${filePath}`);
  }

  if (options.verbose) {
    console.error(`[INFO] Parsing: ${filePath}`);
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Output format: ${format}`);
  }

  const document = await extractPdfLines(filePath);

  if (options.verbose) {
    console.error(`[INFO] Extracted ${document.totalPages} pages, ${document.lines.length} lines`);
  }

  const accountType = resolveAccountType(options.accountType, document.lines, options.verbose);
  const result = parseStatement(document.lines, { accountType });

  if (options.verbose && result.warnings.length > 0) {
    console.error('[WARN] Warnings:');
    for (const warning of result.warnings) {
      console.error(`  - ${warning}`);
    }
  }

  if (result.transactions.length === 0) {
    console.error('[ERROR] No transactions extracted; check the statement layout or --account-type');
    process.exit(1);
  }

  const movements = toMovements(result);
  const totals = computeTotals(movements);

  if (options.verbose) {
    console.error(`[INFO] Found ${result.transactions.length} transactions (${accountType})`);
    printTotals(accountType, totals);
  }

  switch (format) {
    case 'xlsx': {
      if (options.out === undefined) {
        throw new Error('--out is required for xlsx output');
      }
      const outPath = resolve(options.out);
      await writeOutput(outPath, exportXlsx(movements));
      console.error(`[SUCCESS] Exported → ${outPath}`);
      break;
    }

    case 'csv': {
      const csv = exportCsv(movements);
      if (options.out === undefined) {
        console.log(csv);
        console.log('');
        console.log(exportTotalsCsv(movements));
        break;
      }
      const outPath = resolve(options.out);
      const totalsPath = totalsPathFor(outPath);
      await writeOutput(outPath, `${csv}\n`);
      await writeOutput(totalsPath, `${exportTotalsCsv(movements)}\n`);
      console.error(`[SUCCESS] Exported → ${outPath}`);
      console.error(`[SUCCESS] Totals → ${totalsPath}`);
      break;
    }

    case 'json': {
      const output: StatementOutput = {
        source: {
          fileName: basename(filePath),
          totalPages: document.totalPages,
        },
        parserVersion: PARSER_VERSION,
        parsedAt: new Date().toISOString(),
        movements,
        totals,
        warnings: result.warnings,
      };

      if (options.strict) {
        const validation = StatementOutputSchema.safeParse(output);
        if (!validation.success) {
          console.error('[ERROR] Schema validation failed:');
          for (const issue of validation.error.issues) {
            console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
          }
          process.exit(1);
        }
      }

      const json = options.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output);
      if (options.out === undefined) {
        console.log(json);
      } else {
        const outPath = resolve(options.out);
        await writeOutput(outPath, json);
        console.error(`[SUCCESS] Exported → ${outPath}`);
      }
      break;
    }
  }
}

await program.parseAsync();
