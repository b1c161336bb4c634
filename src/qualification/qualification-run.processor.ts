import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NonRetryableMessageError, RabbitMQService } from '../rabbitmq/rabbitmq.service';
import { QualificationRunService, RunExecution, RunRequest } from './qualification-run.service';
import { getErrorMessage } from '../common/utils/error.util';

export function isRunRequest(value: unknown): value is RunRequest {
  if (typeof value !== 'object' || value === null) return false;
  const job: Record<string, unknown> = { ...value };
  return (
    Array.isArray(job.rows) &&
    (job.source === undefined || typeof job.source === 'string') &&
    (job.requestedBy === undefined || typeof job.requestedBy === 'string') &&
    (job.force === undefined || typeof job.force === 'boolean')
  );
}

@Injectable()
export class QualificationRunProcessor implements OnModuleInit {
  private readonly logger = new Logger(QualificationRunProcessor.name);
  private readonly queueName: string;

  constructor(
    private rabbitMQService: RabbitMQService,
    private configService: ConfigService,
    private runService: QualificationRunService,
  ) {
    this.queueName = this.configService.get<string>('rabbitmq.queue') || 'qualification.run';
  }

  async onModuleInit(): Promise<void> {
    // Only the worker process consumes; the API only publishes
    if (process.env.WORKER_MODE === 'true') {
      await this.startConsuming();
    }
  }

  async startConsuming(): Promise<void> {
    this.logger.log(`Starting qualification run processor for queue: ${this.queueName}`);

    await this.rabbitMQService.consume(this.queueName, async (payload) => {
      await this.processRunJob(payload);
    });

    this.logger.log('Qualification run processor is now listening for jobs');
  }

  /**
   * Executes one queued run request. A run is never repeated on its own:
   * a failed run stays failed until an operator submits the batch again,
   * and a message that could not be executed is dead-lettered.
   */
  async processRunJob(payload: unknown): Promise<void> {
    if (!isRunRequest(payload)) {
      this.logger.error('Invalid run job payload');
      throw new NonRetryableMessageError('Invalid run job: expected { rows: [...] }');
    }

    let execution: RunExecution;
    try {
      execution = await this.runService.execute({ ...payload, executionContext: 'worker' });
    } catch (error) {
      this.logger.error(`Error processing queued run: ${getErrorMessage(error)}`);
      throw new NonRetryableMessageError(
        `Queued run could not be executed: ${getErrorMessage(error)}`,
      );
    }

    const { run, deduplicated } = execution;
    if (deduplicated) {
      this.logger.log(`Queued input already processed by run ${run.id}, skipping`);
    } else if (run.status === 'failed') {
      this.logger.warn(`Queued run ${run.id} failed: ${run.errorMessage ?? 'unknown error'}`);
    } else {
      this.logger.log(`Processed queued run ${run.id} with status ${run.status}`);
    }
  }
}
