#!/usr/bin/env node
import { resolveConfig, validateConfig } from './config';
import { createShutdown } from './bootstrap/shutdown';
import { runStartupChecks } from './bootstrap/startupChecks';
import { TerminalConsole } from './cli/TerminalConsole';
import { PipelineCoordinator } from './core/PipelineCoordinator';
import { describeError } from './errors';
import { StructuredLogger } from './logging/StructuredLogger';
import { WhisperTranscriber } from './services/asr/WhisperTranscriber';
import { FfmpegAudioCapture } from './services/capture/FfmpegAudioCapture';
import { OllamaCorrector } from './services/corrector/OllamaCorrector';
import { ToggleHotkey } from './services/hotkey/ToggleHotkey';
import { ExclusionPolicy } from './services/inject/ExclusionPolicy';
import { createKeystrokeBackend } from './services/inject/keystrokeBackends';
import { TextInjector } from './services/inject/TextInjector';
import { ClipboardWriter } from './services/output/ClipboardWriter';
import { TranscriptJournal } from './services/output/TranscriptJournal';

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid hushtype configuration:\n- ${configErrors.join('\n- ')}`);
  }

  const logger = await StructuredLogger.create(config.logDir, { minLevel: config.logLevel, console: false });
  logger.info('hushtype bootstrap started', { logPath: logger.getLogPath(), hotkey: config.hotkey });

  const corrector = new OllamaCorrector({
    baseUrl: `http://${config.ollamaHost}:${config.ollamaPort}`,
    style: config.correctionStyle,
    temperature: config.correctionTemperature,
    timeoutMs: config.correctionTimeoutMs,
    logger
  });

  const report = await runStartupChecks(config, logger, { corrector });

  const transcriber = new WhisperTranscriber(config, logger);
  const coordinator = new PipelineCoordinator(
    {
      capture: new FfmpegAudioCapture({
        ffmpegBin: config.ffmpegBin,
        inputFormat: config.ffmpegInputFormat,
        input: config.ffmpegInput,
        sampleRate: config.sampleRate,
        channels: config.channels,
        levelIntervalMs: config.levelIntervalMs,
        logger
      }),
      transcriber,
      corrector,
      injector: new TextInjector({
        backend: createKeystrokeBackend(config.keystrokeBackend),
        policy: new ExclusionPolicy(config.autoTypeExcludedApps),
        delayMs: config.autoTypeDelayMs,
        charDelayMs: config.autoTypeCharDelayMs,
        logger
      })
    },
    config,
    { logger }
  );

  const outputs: Array<TranscriptJournal | ClipboardWriter> = [];

  if (config.logTranscriptions) {
    const journal = new TranscriptJournal(config.transcriptLogPath, logger);
    coordinator.on('event', (event) => journal.record(event));
    outputs.push(journal);
  }

  if (config.copyToClipboard) {
    const clipboard = new ClipboardWriter({ logger });
    coordinator.on('event', (event) => clipboard.handle(event));
    outputs.push(clipboard);
  }

  const hotkey = new ToggleHotkey({
    accelerator: config.hotkey,
    debounceMs: config.hotkeyDebounceMs,
    onToggle: () => {
      coordinator.toggle();
    },
    logger
  });

  const shutdown = createShutdown({
    stopInput: () => {
      hotkey.stop();
      terminal.close();
    },
    pipeline: coordinator,
    outputs,
    logger,
    exit: () => {
      process.stdout.write('Bye.\n');
      process.exit(0);
    }
  });

  const terminal = new TerminalConsole({
    pipeline: coordinator,
    input: process.stdin,
    output: process.stdout,
    hotkey: config.hotkey,
    listModels: config.correctionEnabled ? () => corrector.listAvailableModels() : undefined,
    onQuit: shutdown
  });

  for (const warning of report.warnings) {
    terminal.print(`[warning] ${warning}`);
  }

  terminal.print(`Loading speech model '${config.whisperModel}'...`);
  await transcriber.warmup();
  terminal.print('Ready.');

  try {
    await hotkey.start();
  } catch (error) {
    const detail = describeError(error);
    logger.warn('Global hotkey unavailable; use <enter> in this terminal instead', { detail });
    terminal.print(`[warning] Global hotkey unavailable (${detail}); press <enter> to toggle recording.`);
  }

  terminal.start();

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info('Received signal', { signal });
    shutdown().catch((error: unknown) => {
      process.stderr.write(`Shutdown failed: ${describeError(error)}\n`);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
};

bootstrap().catch((error: unknown) => {
  process.stderr.write(`hushtype startup error: ${describeError(error)}\n`);
  process.exit(1);
});
