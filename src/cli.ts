#!/usr/bin/env node
import { Command, Option } from 'commander';
import path from 'path';
import pLimit from 'p-limit';
import { loadConfig } from './config';
import { BatchRow, Exporter, toDisplayRecord } from './modules/exporter';
import { ingestCSV } from './modules/ingestor';
import { Logger, ResolutionMetrics } from './modules/observability';
import { ContactResolver } from './pipeline';
import { TierPolicy } from './types';
import { ResolverError } from './utils/errors';
import { SlidingWindowRateLimiter } from './utils/rate_limit';
import { Validators } from './utils/validators';

// queries in flight at once; the rate limiter paces them further
const BATCH_CONCURRENCY = 2;

const policyOption = () => new Option('-p, --policy <policy>', 'Tier policy')
    .choices(['first-valid-tier', 'exhaustive']);

function parsePolicy(value: unknown): TierPolicy | undefined {
    return value === 'first-valid-tier' || value === 'exhaustive' ? value : undefined;
}

function fail(e: unknown): never {
    if (e instanceof ResolverError) {
        console.error(`${e.code}: ${e.message}`);
    } else {
        console.error('Fatal Error:', e instanceof Error ? e.message : String(e));
    }
    process.exit(1);
}

const program = new Command();

program
    .name('contact-resolver')
    .description('Resolve a contact phone number from a person name and an employer')
    .version('1.0.0');

program
    .command('resolve')
    .description('Resolve a single contact')
    .requiredOption('-n, --name <person>', 'Person name')
    .requiredOption('-c, --company <company>', 'Company name')
    .addOption(policyOption())
    .option('--json', 'Print the result as JSON')
    .option('--trace', 'Include per-source provenance')
    .action(async (options: { name: string; company: string; policy?: string; json?: boolean; trace?: boolean }) => {
        try {
            loadConfig();
            const query = Validators.toQuery(options.name, options.company);
            const resolver = ContactResolver.fromConfig({ tierPolicy: parsePolicy(options.policy) });
            const outcome = await resolver.resolveWithTrace(query);
            const record = toDisplayRecord(outcome.contact);

            if (options.json) {
                const payload = options.trace ? { ...record, attempts: outcome.attempts } : record;
                console.log(JSON.stringify(payload, null, 2));
                return;
            }

            for (const [field, value] of Object.entries(record)) {
                console.log(`${field.padEnd(18)} ${value ?? '-'}`);
            }
            if (options.trace) {
                for (const a of outcome.attempts) {
                    console.log(`  [${a.tier}] ${a.source}: ${a.fetchError ?? `${a.validCandidates}/${a.candidates} valid`}`);
                }
            }
        } catch (e) {
            fail(e);
        }
    });

program
    .command('batch')
    .description('Resolve every row of a CSV (person_name, company_name)')
    .requiredOption('-i, --input <path>', 'Input CSV file path')
    .requiredOption('-o, --output <path>', 'Output file path')
    .addOption(policyOption())
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['csv', 'json']).default('csv'))
    .action(async (options: { input: string; output: string; policy?: string; format: string }) => {
        try {
            const config = loadConfig();
            const inputPath = path.resolve(options.input);
            const outputPath = path.resolve(options.output);
            const resolver = ContactResolver.fromConfig({ tierPolicy: parsePolicy(options.policy) });
            const limiter = new SlidingWindowRateLimiter(config.cli.requestsPerMinute);
            const metrics = new ResolutionMetrics();
            const limit = pLimit(BATCH_CONCURRENCY);

            Logger.info(`Batch started: ${inputPath} -> ${outputPath}`);

            const rows: BatchRow[] = [];
            for await (const row of ingestCSV(inputPath)) {
                rows.push(row);
            }

            await Promise.all(rows.map((row) => limit(async () => {
                if (!row.query) return;
                await limiter.waitForSlot();
                const outcome = await resolver.resolveWithTrace(row.query);
                row.contact = outcome.contact;
                metrics.record(outcome);
            })));

            if (options.format === 'json') {
                Exporter.writeJSON(rows, outputPath);
            } else {
                Exporter.writeCSV(rows, outputPath);
            }
            Logger.info('Batch finished', metrics.getSummary());
        } catch (e) {
            fail(e);
        }
    });

program.parseAsync(process.argv).catch(fail);
