/**
 * Entry point: run one research pipeline and serve the inspection API over
 * its store.
 *
 * Usage: main <company name> <ticker> [question]
 *
 * No data collectors are wired here; embedders pass their own to
 * `createResearchPipeline`.
 */

import { loadConfig } from './config';
import { ConfigurationError, describeError } from './domain/errors';
import { logger, setLogLevel } from './logger';
import { createResearchPipeline } from './pipeline/research-pipeline';
import { createApp, createAppContext } from './server';

async function main(): Promise<void> {
  const [companyName, ticker, question] = process.argv.slice(2);
  if (!companyName || !ticker) {
    logger.error('Usage: main <company name> <ticker> [question]');
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const pipeline = createResearchPipeline(config, []);
  const orchestrator = pipeline.createOrchestrator();
  const app = createApp(createAppContext(orchestrator.store));
  const server = app.listen(config.inspectionPort, () => {
    logger.info('Inspection API listening', { port: config.inspectionPort });
  });

  try {
    const result = await pipeline.run(
      {
        companyName,
        ticker,
        question: question ?? `What is the investment outlook for ${companyName} (${ticker})?`,
        analysisGoal: `Assess the financial position and recent developments of ${companyName} (${ticker})`,
      },
      orchestrator,
    );
    process.stdout.write(result.markdown);
  } catch (err) {
    // The API stays up after a successful run; a failed one must let the process exit.
    server.close();
    throw err;
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.error('Invalid configuration', { keys: err.keys });
  } else {
    logger.error('Research run failed', { error: describeError(err).message });
  }
  process.exitCode = 1;
});
