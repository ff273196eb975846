import { err, errorMessage, Result } from '../errors';
import { FileServiceFactory, GenerativeFileService, RemoteFile } from './fileService';
import { parseAnalysisText } from './parseResult';
import { buildPrompt } from './prompts';
import { AnalysisError, AnalysisResult, Stage } from './types';

const PDF_MIME_TYPE = 'application/pdf';

export interface AnalysisRequest {
  filePath: string;
  stage: Stage;
  apiKey: string;
}

export interface AnalysisClientOptions {
  pollIntervalMs: number;
  maxWaitMs: number;
  rateLimitRetryMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function isRateLimitError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const status = 'status' in error ? error.status : undefined;
  const code = 'code' in error ? error.code : undefined;
  if (status === 429 || code === 429 || status === 'RESOURCE_EXHAUSTED') return true;
  const message = error instanceof Error ? error.message : '';
  return message.includes('429') || message.includes('RESOURCE_EXHAUSTED');
}

class PollTimeout extends Error {
  constructor(readonly waitedMs: number) {
    super(`File was still processing after ${waitedMs}ms`);
  }
}

class ProcessingFailed extends Error {}

/**
 * Runs one gap analysis against the generative-AI service. Never throws:
 * every failure comes back as a tagged {@link AnalysisError}.
 *
 * The caller owns `filePath` and removes it afterwards.
 */
export class AnalysisClient {
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private createService: FileServiceFactory,
    private options: AnalysisClientOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async analyze(request: AnalysisRequest): Promise<Result<AnalysisResult, AnalysisError>> {
    let service: GenerativeFileService;
    try {
      service = this.createService(request.apiKey);
    } catch (error) {
      return err<AnalysisError>({ kind: 'Other', message: errorMessage(error) });
    }

    let file: RemoteFile;
    try {
      const uploaded = await this.withRateLimitRetry(() => service.upload(request.filePath, PDF_MIME_TYPE));
      file = await this.waitUntilActive(uploaded, (name) => service.get(name));
    } catch (error) {
      return err(classifyUploadError(error));
    }

    let rawText: string;
    try {
      rawText = await this.withRateLimitRetry(() => service.generate(buildPrompt(request.stage), file));
    } catch (error) {
      if (isRateLimitError(error)) {
        return err<AnalysisError>({ kind: 'RateLimited', message: `AI quota exhausted: ${errorMessage(error)}` });
      }
      return err<AnalysisError>({ kind: 'Other', message: `AI processing failed: ${errorMessage(error)}` });
    }

    return parseAnalysisText(rawText);
  }

  private async waitUntilActive(file: RemoteFile, refresh: (name: string) => Promise<RemoteFile>): Promise<RemoteFile> {
    let current = file;
    let waitedMs = 0;
    while (current.state === 'PROCESSING') {
      if (waitedMs >= this.options.maxWaitMs) {
        throw new PollTimeout(waitedMs);
      }
      await this.sleep(this.options.pollIntervalMs);
      waitedMs += this.options.pollIntervalMs;
      current = await refresh(current.name);
    }
    if (current.state === 'FAILED') {
      throw new ProcessingFailed(`AI service could not process ${current.name}`);
    }
    return current;
  }

  // Quota errors get exactly one delayed retry.
  private async withRateLimitRetry<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (!isRateLimitError(error)) throw error;
      console.warn(`AI service rate limited, retrying once in ${this.options.rateLimitRetryMs}ms`);
      await this.sleep(this.options.rateLimitRetryMs);
      return call();
    }
  }
}

function classifyUploadError(error: unknown): AnalysisError {
  if (error instanceof PollTimeout) {
    return { kind: 'TimeoutExceeded', message: error.message, waitedMs: error.waitedMs };
  }
  if (isRateLimitError(error)) {
    return { kind: 'RateLimited', message: `AI quota exhausted: ${errorMessage(error)}` };
  }
  return { kind: 'UploadFailed', message: `File upload failed: ${errorMessage(error)}` };
}
