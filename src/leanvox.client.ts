/**
 * Leanvox Client
 * Entry point of the SDK: owns the credential, the configuration and one transport
 */

import {
  defaultConfigPath,
  ensureApiKey,
  resolveApiKey,
  type CredentialSources,
} from '@/modules/auth';
import {
  AxiosTransport,
  RequestExecutor,
  type ByteStream,
  type ExecutorProvider,
  type HttpTransport,
} from '@/modules/http';
import {
  AccountService,
  FilesService,
  GenerationsService,
  VoicesService,
} from '@/modules/resources';
import {
  GenerationService,
  type DialogueLine,
  type DialogueOptions,
  type GenerateAsyncParams,
  type GenerateParams,
  type GenerateResult,
  type Job,
  type StreamParams,
} from '@/modules/tts';
import { clientDefaults, env } from '@/shared/config';
import { logger, sleep as defaultSleep, type SleepFn } from '@/shared/utils';

export interface LeanvoxOptions {
  /** Falls back to LEANVOX_API_KEY, then ~/.lvox/config.toml */
  apiKey?: string;
  /** Falls back to LEANVOX_BASE_URL, then https://api.leanvox.com */
  baseUrl?: string;
  timeoutMs?: number;
  streamTimeoutMs?: number;
  streamIdleTimeoutMs?: number;
  maxRetries?: number;
  autoAsyncThreshold?: number;
  pollIntervalMs?: number;
  /** Replaces the default axios transport */
  transport?: HttpTransport;
  /** Used for retry backoff and job polling */
  sleep?: SleepFn;
  /** Where ambient credentials are looked up */
  credentialSources?: CredentialSources;
}

export interface ClientConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly streamTimeoutMs: number;
  readonly streamIdleTimeoutMs: number;
  readonly maxRetries: number;
  readonly autoAsyncThreshold: number;
  readonly pollIntervalMs: number;
}

/**
 * Leanvox - text-to-speech API client
 *
 * The API key is resolved (and validated) at construction, but its absence is
 * only reported by the first call that needs the network.
 */
export class Leanvox {
  readonly config: ClientConfig;

  readonly voices: VoicesService;
  readonly files: FilesService;
  readonly generations: GenerationsService;
  readonly account: AccountService;

  private readonly apiKey: string | undefined;
  private readonly configPath: string;
  private readonly transport: HttpTransport | undefined;
  private readonly sleep: SleepFn;
  private readonly tts: GenerationService;
  private executor: RequestExecutor | null = null;
  private closed = false;

  constructor(options: LeanvoxOptions = {}) {
    const sources = options.credentialSources ?? {};
    this.apiKey = resolveApiKey(options.apiKey, sources);
    this.configPath = sources.configPath ?? defaultConfigPath();

    this.config = Object.freeze({
      baseUrl: options.baseUrl ?? env.baseUrl() ?? clientDefaults.baseUrl,
      timeoutMs: options.timeoutMs ?? clientDefaults.timeoutMs,
      streamTimeoutMs: options.streamTimeoutMs ?? clientDefaults.streamTimeoutMs,
      streamIdleTimeoutMs: options.streamIdleTimeoutMs ?? clientDefaults.streamIdleTimeoutMs,
      maxRetries: options.maxRetries ?? clientDefaults.maxRetries,
      autoAsyncThreshold: options.autoAsyncThreshold ?? clientDefaults.autoAsyncThreshold,
      pollIntervalMs: options.pollIntervalMs ?? clientDefaults.pollIntervalMs,
    });

    if (!Number.isInteger(this.config.maxRetries) || this.config.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.config.maxRetries}`);
    }

    this.transport = options.transport;
    this.sleep = options.sleep ?? defaultSleep;

    const provider: ExecutorProvider = () => this.getExecutor();
    this.tts = new GenerationService(provider, {
      autoAsyncThreshold: this.config.autoAsyncThreshold,
      pollIntervalMs: this.config.pollIntervalMs,
      sleep: this.sleep,
    });
    this.voices = new VoicesService(provider);
    this.files = new FilesService(provider);
    this.generations = new GenerationsService(provider);
    this.account = new AccountService(provider);
  }

  generate(params: GenerateParams): Promise<GenerateResult> {
    return this.tts.generate(params);
  }

  stream(params: StreamParams): Promise<ByteStream> {
    return this.tts.stream(params);
  }

  generateAsync(params: GenerateAsyncParams): Promise<Job> {
    return this.tts.generateAsync(params);
  }

  getJob(jobId: string): Promise<Job> {
    return this.tts.getJob(jobId);
  }

  listJobs(): Promise<Job[]> {
    return this.tts.listJobs();
  }

  waitForJob(job: Job | string): Promise<Job> {
    return this.tts.waitForJob(job);
  }

  dialogue(lines: DialogueLine[], options?: DialogueOptions): Promise<GenerateResult> {
    return this.tts.dialogue(lines, options);
  }

  /**
   * Release the transport. Idempotent; a client that never made a request
   * has nothing to release.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.executor?.close();
    this.executor = null;
  }

  /**
   * Create the executor on first use. Runs synchronously, so concurrent
   * calls cannot build two transports.
   */
  private getExecutor(): RequestExecutor {
    if (this.closed) {
      throw new Error('Client has been closed');
    }
    if (this.executor) {
      return this.executor;
    }

    const apiKey = ensureApiKey(this.apiKey, this.configPath);

    this.executor = new RequestExecutor({
      apiKey,
      transport:
        this.transport ??
        new AxiosTransport({ baseUrl: this.config.baseUrl, timeoutMs: this.config.timeoutMs }),
      timeoutMs: this.config.timeoutMs,
      streamTimeoutMs: this.config.streamTimeoutMs,
      streamIdleTimeoutMs: this.config.streamIdleTimeoutMs,
      maxRetries: this.config.maxRetries,
      sleep: this.sleep,
    });

    logger.debug('Client initialized', { baseUrl: this.config.baseUrl });
    return this.executor;
  }
}
