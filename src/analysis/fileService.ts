import {
  createPartFromUri,
  createUserContent,
  FileState,
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
} from '@google/genai';

export type RemoteFileState = 'PROCESSING' | 'ACTIVE' | 'FAILED';

export interface RemoteFile {
  name: string;
  uri: string;
  mimeType: string;
  state: RemoteFileState;
}

/**
 * The slice of the generative-AI service the analysis needs: upload a file,
 * check on its processing, and ask about it.
 */
export interface GenerativeFileService {
  upload(filePath: string, mimeType: string): Promise<RemoteFile>;
  get(name: string): Promise<RemoteFile>;
  generate(prompt: string, file: RemoteFile): Promise<string>;
}

export type FileServiceFactory = (apiKey: string) => GenerativeFileService;

// Deeds talk about disputes, deaths and litigation; don't let the filters block them.
const SAFETY_SETTINGS = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }));

function toState(state: FileState | undefined): RemoteFileState {
  switch (state) {
    case FileState.ACTIVE:
      return 'ACTIVE';
    case FileState.FAILED:
      return 'FAILED';
    default:
      return 'PROCESSING';
  }
}

interface GenAIFileLike {
  name?: string;
  uri?: string;
  mimeType?: string;
  state?: FileState;
}

function toRemoteFile(file: GenAIFileLike, fallbackMimeType: string): RemoteFile {
  if (!file.name) {
    throw new Error('Upload response did not include a file name');
  }
  return {
    name: file.name,
    uri: file.uri ?? '',
    mimeType: file.mimeType ?? fallbackMimeType,
    state: toState(file.state),
  };
}

export class GeminiFileService implements GenerativeFileService {
  private ai: GoogleGenAI;

  constructor(
    apiKey: string,
    private model: string,
  ) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async upload(filePath: string, mimeType: string): Promise<RemoteFile> {
    const file = await this.ai.files.upload({ file: filePath, config: { mimeType } });
    return toRemoteFile(file, mimeType);
  }

  async get(name: string): Promise<RemoteFile> {
    const file = await this.ai.files.get({ name });
    return toRemoteFile(file, 'application/pdf');
  }

  async generate(prompt: string, file: RemoteFile): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: createUserContent([prompt, createPartFromUri(file.uri, file.mimeType)]),
      config: { safetySettings: SAFETY_SETTINGS },
    });
    return response.text ?? '';
  }
}

export function geminiFileServiceFactory(model: string): FileServiceFactory {
  return (apiKey) => new GeminiFileService(apiKey, model);
}
