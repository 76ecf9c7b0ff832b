#!/usr/bin/env node
/**
 * Unreeled - Main entry point
 *
 * One run per invocation: fetch every provider for the target date, filter,
 * deduplicate, enrich and write releases_<date>.json. Provider failures are
 * reported in the output; only configuration and write failures exit non-zero.
 */
import 'dotenv/config';
import { parseArgs, resolveTargetDate, USAGE, UsageError } from './cli.js';
import { ConfigurationError, getRedactedConfig, loadConfig, reportConfigurationError, type Config } from './config/index.js';
import { logger, setLogLevel } from './observability/logger.js';
import { writeMetricsFile } from './observability/metrics.js';
import { runAggregation } from './services/aggregator.service.js';

function loadConfigOrExit(): Config {
    try {
        return loadConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            reportConfigurationError(error);
            process.exit(1);
        }
        throw error;
    }
}

async function main(): Promise<number> {
    let targetDate: string;
    try {
        const options = parseArgs(process.argv.slice(2));
        if (options.help) {
            console.log(USAGE);
            return 0;
        }
        targetDate = resolveTargetDate(options);
    } catch (error) {
        if (!(error instanceof UsageError)) throw error;
        console.error(`${error.message}\n\n${USAGE}`);
        return 1;
    }

    // Configuration errors are fatal before any network call
    const config = loadConfigOrExit();
    setLogLevel(config.logLevel);

    logger.info('Starting Unreeled ingestion', { targetDate });
    logger.debug('Configuration loaded', getRedactedConfig(config));

    try {
        const result = await runAggregation(targetDate, config);

        logger.info('Ingestion finished', {
            runId: result.runId,
            outputPath: result.outputPath,
            totalReleases: result.batch.total_releases,
        });
        return 0;
    } catch (error) {
        logger.error('Ingestion failed', error, { targetDate });
        return 1;
    } finally {
        if (config.metricsFile) {
            await writeMetricsFile(config.metricsFile).catch((error: unknown) => {
                logger.error('Failed to write metrics file', error, { path: config.metricsFile });
            });
        }
    }
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        logger.error('Unhandled error', error);
        process.exitCode = 1;
    });
