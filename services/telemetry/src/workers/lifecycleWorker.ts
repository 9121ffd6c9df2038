import { loadServiceConfig } from '../config/serviceConfig';
import { closeLifecycleQueue, createLifecycleWorker, verifyLifecycleQueueConnection } from '../lifecycle/queue';
import { createLogger } from '../logger';
import { createTelemetryService, type TelemetryService } from '../service';

interface CliOptions {
  once: boolean;
  now?: Date;
}

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const logger = createLogger({ level: config.logLevel, name: 'telemetry-lifecycle' });
  const cli = parseCliOptions(process.argv.slice(2));

  if (config.inlineMode && !cli.once) {
    logger.info('REDIS_URL=inline - lifecycle queue disabled, the service runs retention in-process');
    process.stdin.resume();
    return;
  }

  const service = await createTelemetryService({ config, logger });

  if (cli.once) {
    try {
      const report = await service.retention.sweep(cli.now ?? new Date(), 'manual');
      logger.info(
        {
          status: report.status,
          cutoff: report.cutoff,
          droppedChunks: report.droppedChunks.length,
          failedChunks: report.failedChunks.length,
          rollupsDeleted: report.rollupsDeleted,
          rollupsRecomputed: report.rollupsRecomputed,
          alertsPurged: report.alertsPurged,
          anomaliesPurged: report.anomaliesPurged
        },
        'manual retention sweep complete'
      );
      if (report.status === 'failed') {
        process.exitCode = 1;
      }
    } finally {
      await service.close();
    }
    return;
  }

  await runQueueWorker(service);
}

async function runQueueWorker(service: TelemetryService): Promise<void> {
  const { config, logger } = service;
  await verifyLifecycleQueueConnection(config, logger);

  const worker = createLifecycleWorker(
    config,
    logger,
    async (job) => {
      const report = await service.retention.sweep(new Date(), job.data.trigger);
      if (report.status === 'failed') {
        throw new Error(report.message ?? 'retention sweep failed');
      }
      return { status: report.status, droppedChunks: report.droppedChunks.length };
    },
    { concurrency: 1 }
  );

  worker.on('completed', (job, result: unknown) => {
    logger.info({ jobId: job.id, requestId: job.data.requestId, result }, 'lifecycle job completed');
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'lifecycle job failed');
  });

  worker.on('error', (err) => {
    logger.error({ err }, 'lifecycle worker error');
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'shutting down lifecycle worker');
    await worker.close();
    await closeLifecycleQueue();
    await service.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  logger.info({ queue: config.lifecycle.queueName }, 'lifecycle worker online');
  process.stdin.resume();
}

function parseCliOptions(args: string[]): CliOptions {
  const options: CliOptions = { once: false };

  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (arg === '--once') {
      options.once = true;
      continue;
    }
    if (arg === '--now') {
      options.now = parseNow(args[index + 1]);
      index += 1;
      continue;
    }
    if (arg.startsWith('--now=')) {
      options.now = parseNow(arg.slice('--now='.length));
    }
  }

  return options;
}

function parseNow(value: string | undefined): Date {
  const parsed = value ? new Date(value) : new Date(Number.NaN);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`--now expects an ISO-8601 timestamp, received ${value ?? 'nothing'}`);
  }
  return parsed;
}

main().catch((err: unknown) => {
  console.error('[telemetry:lifecycle] fatal error', err);
  process.exit(1);
});
