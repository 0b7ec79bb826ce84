export type StreamClassification = 'combined' | 'video-only';

export interface StreamDescriptor {
  index: number; // 1-based, catalog order
  id: string;
  extension: string;
  resolution: string;
  height: number | null;
  hasAudio: boolean;
  classification: StreamClassification;
  note: string; // raw catalog row
}

export type FormatSelection =
  | { kind: 'best' }
  | { kind: 'format'; format: StreamDescriptor };

export type MediaKind = 'video' | 'audio' | 'merged';

export interface MediaAsset {
  path: string;
  kind: MediaKind;
  present: boolean;
}

export interface SubtitleSegment {
  index: number;
  start: number; // seconds
  end: number;
  text: string;
}

export type SubtitleTrack = SubtitleSegment[];

export type SubtitleSource = 'manual' | 'converted' | 'transcribed';

export interface PipelineContext {
  url: string;
  videoId: string;
  title: string;
  container: string; // file extension of the packager's output
  scratchDir: string;
  outputDir: string;
  outputPath: string;
  videoPath: string;
  audioPath: string;
  subtitlePath: string;
  video?: MediaAsset;
  audio?: MediaAsset;
  subtitles?: SubtitleTrack;
}

export interface SubtitleOptions {
  language: string; // filter passed to the source, e.g. "en"
  trackLanguage: string; // ISO 639-2 tag written into the container
  trackName: string;
}

export interface WhisperOptions {
  pythonBin: string;
  modelDir: string;
  preferredModel: string;
  fallbackModel: string;
  computeType: string;
}

export interface YtDlpOptions {
  bin: string;
  pythonBin: string;
  cookiesFile: string;
  userAgent: string;
  extraArgs: string[];
}

export interface PipelineConfig {
  outputDir: string;
  scratchRoot: string;
  subtitles: SubtitleOptions;
  ytdlp: YtDlpOptions;
  ffmpegBin: string;
  mkvmergeBin: string;
  whisper: WhisperOptions;
}

// ---- collaborators ----

export interface FetchOptions {
  mergeFormat?: string;
  audioOnly?: boolean;
  extractFormat?: string;
}

export interface MediaSourceClient {
  listFormats(url: string): Promise<string>;
  fetch(url: string, selector: string, destination: string, options?: FetchOptions): Promise<string>;
  fetchTitle(url: string): Promise<string>;
  /** Returns the absolute paths of the subtitle files written. */
  fetchSubtitles(url: string, languageFilter: string, destinationPattern: string): Promise<string[]>;
}

export interface ConvertOptions {
  subtitleCodec?: string;
}

export interface CodecPolicy {
  video: 'copy';
  audio: 'copy' | 'aac';
}

export interface MediaTranscoder {
  convert(inputPath: string, outputPath: string, options?: ConvertOptions): Promise<void>;
  remux(videoPath: string, audioPath: string, outputPath: string, policy: CodecPolicy): Promise<void>;
}

export type PackageTrack =
  | { kind: 'media'; path: string }
  | {
      kind: 'subtitle';
      path: string;
      language: string;
      name: string;
      isDefault: boolean;
      isForced: boolean;
    };

export interface ContainerPackager {
  package(outputPath: string, tracks: PackageTrack[]): Promise<string>;
}

export interface TranscribeRequest {
  wordTimestamps: boolean;
  verbatimPrompt: string;
}

export interface TimedText {
  start: number;
  end: number;
  text: string;
}

export interface SpeechEngine {
  transcribe(audioPath: string, options: TranscribeRequest): Promise<TimedText[]>;
}

export interface PipelineDeps {
  source: MediaSourceClient;
  transcoder: MediaTranscoder;
  packager: ContainerPackager;
  speech: SpeechEngine;
}
