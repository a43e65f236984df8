import fs from 'node:fs';
import path from 'node:path';
import { describeError } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { clipboardCommandFor } from '../services/output/ClipboardWriter';
import { runCommand, type CommandRunner } from '../services/process/runCommand';
import type { AppConfig } from '../types';

interface CorrectionProbe {
  getBaseUrl: () => string;
  isAvailable: () => Promise<boolean>;
  listAvailableModels: () => Promise<string[]>;
}

export interface StartupCheckOptions {
  corrector?: CorrectionProbe;
  commandRunner?: CommandRunner;
  platform?: NodeJS.Platform;
  fileExists?: (absolutePath: string) => boolean;
}

export interface StartupReport {
  warnings: string[];
}

const CHECK_TIMEOUT_MS = 8000;

const assertPathExists = (exists: (absolutePath: string) => boolean, absolutePath: string, label: string): void => {
  if (!exists(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Set HUSHTYPE_TRANSCRIBER_SCRIPT to its location.`);
  }
};

const keystrokeToolFor = (config: AppConfig, platform: NodeJS.Platform): string => {
  if (config.keystrokeBackend !== 'auto') {
    return config.keystrokeBackend;
  }

  return platform === 'darwin' ? 'osascript' : 'xdotool';
};

const modelIsInstalled = (installed: string[], model: string): boolean =>
  installed.some((name) => name === model || name === `${model}:latest`);

/**
 * Fails on anything recording or transcription cannot run without; returns
 * warnings for correction, typing and clipboard, which degrade gracefully.
 */
export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger,
  options: StartupCheckOptions = {}
): Promise<StartupReport> => {
  const run = options.commandRunner ?? runCommand;
  const platform = options.platform ?? process.platform;
  const exists = options.fileExists ?? fs.existsSync;
  const warnings: string[] = [];

  logger.info('Running startup checks');

  await run(config.ffmpegBin, ['-version'], { timeoutMs: CHECK_TIMEOUT_MS });

  assertPathExists(exists, path.resolve(config.transcriberScriptPath), 'Transcriber worker script');
  await run(config.pythonBin, ['--version'], { timeoutMs: CHECK_TIMEOUT_MS });
  try {
    await run(config.pythonBin, ['-c', 'import faster_whisper; print("deps-ok")'], { timeoutMs: 20000 });
  } catch (error) {
    throw new Error(
      `faster-whisper is not importable from ${config.pythonBin}. Install it with 'pip install faster-whisper'. (${describeError(error)})`
    );
  }

  if (config.correctionEnabled && options.corrector) {
    const corrector = options.corrector;
    if (!(await corrector.isAvailable())) {
      warnings.push(
        `Ollama is not reachable at ${corrector.getBaseUrl()}; transcripts will be typed without correction.`
      );
    } else {
      try {
        const installed = await corrector.listAvailableModels();
        if (!modelIsInstalled(installed, config.correctionModel)) {
          warnings.push(
            `Correction model '${config.correctionModel}' is not installed. Run 'ollama pull ${config.correctionModel}'.`
          );
        }
      } catch (error) {
        warnings.push(`Could not list Ollama models: ${describeError(error)}`);
      }
    }
  }

  if (config.autoTypeEnabled) {
    const tool = keystrokeToolFor(config, platform);
    const probeArgs = tool === 'osascript' ? ['-e', 'return "ok"'] : ['--version'];
    try {
      await run(tool, probeArgs, { timeoutMs: CHECK_TIMEOUT_MS });
    } catch (error) {
      warnings.push(`Auto-typing needs ${tool}, which failed to run: ${describeError(error)}`);
    }
  }

  if (config.copyToClipboard && !clipboardCommandFor(platform)) {
    warnings.push(`Clipboard copy is not supported on ${platform}.`);
  }

  for (const warning of warnings) {
    logger.warn('Startup check warning', { detail: warning });
  }

  logger.info('Startup checks completed', { warnings: warnings.length });
  return { warnings };
};
