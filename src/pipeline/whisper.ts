import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { TranscriptionFailedError } from './errors';
import { runTool, type ToolRunner } from './exec';
import { debug, info } from './log';
import type { SpeechEngine, TimedText, TranscribeRequest, WhisperOptions } from './types';

export const RUNNER_SCRIPT = fileURLToPath(new URL('../../scripts/faster_whisper_runner.py', import.meta.url));

/** Directories faster-whisper may have cached a model's weights under. */
export function modelWeightDirs(modelDir: string, model: string): string[] {
    return [path.join(modelDir, model), path.join(modelDir, `models--Systran--faster-whisper-${model}`)];
}

/**
 * Prefer the more accurate model only when its weights are already on disk;
 * otherwise use the smaller one. Never triggers a download by itself.
 */
export async function selectWhisperModel(opts: Pick<WhisperOptions, 'modelDir' | 'preferredModel' | 'fallbackModel'>): Promise<string> {
    for (const dir of modelWeightDirs(opts.modelDir, opts.preferredModel)) {
        if (await fs.pathExists(dir)) return opts.preferredModel;
    }
    return opts.fallbackModel;
}

function isTimedText(v: unknown): v is TimedText {
    return (
        typeof v === 'object' &&
        v !== null &&
        typeof Reflect.get(v, 'start') === 'number' &&
        typeof Reflect.get(v, 'end') === 'number' &&
        typeof Reflect.get(v, 'text') === 'string'
    );
}

export function parseRunnerOutput(json: unknown): TimedText[] {
    const segments = typeof json === 'object' && json !== null ? Reflect.get(json, 'segments') : undefined;
    if (!Array.isArray(segments)) {
        throw new TranscriptionFailedError('Transcription output has no segments array');
    }
    return segments.filter(isTimedText).map((s) => ({ start: s.start, end: s.end, text: s.text.trim() }));
}

export class FasterWhisperEngine implements SpeechEngine {
    constructor(
        private readonly opts: WhisperOptions,
        private readonly run: ToolRunner = runTool,
        private readonly script: string = RUNNER_SCRIPT
    ) {}

    async transcribe(audioPath: string, options: TranscribeRequest): Promise<TimedText[]> {
        const model = await selectWhisperModel(this.opts);
        const outPath = `${audioPath}.segments.json`;
        info('whisper.model', { model, modelDir: this.opts.modelDir });
        const args = [
            this.script,
            '--audio',
            audioPath,
            '--model',
            model,
            '--model-dir',
            this.opts.modelDir,
            '--compute-type',
            this.opts.computeType,
            '--prompt',
            options.verbatimPrompt,
            '--output',
            outPath,
        ];
        if (options.wordTimestamps) args.push('--word-timestamps');
        await this.run(this.opts.pythonBin, args, { onLine: (line) => debug('whisper.out', { line }) });

        if (!(await fs.pathExists(outPath))) {
            throw new TranscriptionFailedError(`Transcription runner wrote no output at ${outPath}`);
        }
        try {
            return parseRunnerOutput(await fs.readJson(outPath));
        } finally {
            await fs.remove(outPath);
        }
    }
}
