import path from 'node:path';
import type {
  AppConfig,
  AutoTypeMode,
  CorrectionStyle,
  KeystrokeBackendKind,
  LogLevel
} from './types';

const DEFAULT_EXCLUDED_APPS = ['Keychain Access', 'Login Window', '1Password'];

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const parseListOrDefault = (value: string | undefined, fallback: string[]): string[] => {
  if (value === undefined) {
    return [...fallback];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
};

const resolveAutoTypeMode = (value: string | undefined): AutoTypeMode => {
  if (value === 'raw' || value === 'corrected' || value === 'both') {
    return value;
  }

  return 'raw';
};

const resolveCorrectionStyle = (value: string | undefined): CorrectionStyle => {
  if (value === 'transcription' || value === 'minimal' || value === 'formal' || value === 'code') {
    return value;
  }

  return 'transcription';
};

const resolveKeystrokeBackend = (value: string | undefined): KeystrokeBackendKind => {
  if (value === 'osascript' || value === 'xdotool' || value === 'auto') {
    return value;
  }

  return 'auto';
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }

  return 'info';
};

interface CaptureInputDefaults {
  format: string;
  input: string;
}

const getCaptureInputDefaults = (platform: NodeJS.Platform): CaptureInputDefaults => {
  if (platform === 'darwin') {
    return { format: 'avfoundation', input: ':0' };
  }

  if (platform === 'win32') {
    // dshow has no default device; HUSHTYPE_FFMPEG_INPUT must name one.
    return { format: 'dshow', input: '' };
  }

  return { format: 'pulse', input: 'default' };
};

export const resolveConfig = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');
  const captureDefaults = getCaptureInputDefaults(platform);
  const logDir = env.HUSHTYPE_LOG_DIR ?? path.join(rootDir, 'logs');

  return {
    hotkey: env.HUSHTYPE_HOTKEY ?? 'F9',
    hotkeyDebounceMs: parseIntOrDefault(env.HUSHTYPE_HOTKEY_DEBOUNCE_MS, 40),
    ffmpegBin: env.HUSHTYPE_FFMPEG_BIN ?? 'ffmpeg',
    ffmpegInputFormat: env.HUSHTYPE_FFMPEG_FORMAT ?? captureDefaults.format,
    ffmpegInput: env.HUSHTYPE_FFMPEG_INPUT ?? captureDefaults.input,
    sampleRate: parseIntOrDefault(env.HUSHTYPE_SAMPLE_RATE, 16000),
    channels: parseIntOrDefault(env.HUSHTYPE_CHANNELS, 1),
    levelIntervalMs: parseIntOrDefault(env.HUSHTYPE_LEVEL_INTERVAL_MS, 80),
    minRecordingMs: parseIntOrDefault(env.HUSHTYPE_MIN_RECORDING_MS, 500),
    silencePeakThreshold: parseIntOrDefault(env.HUSHTYPE_SILENCE_PEAK_THRESHOLD, 50),
    pythonBin: env.HUSHTYPE_PYTHON_BIN ?? 'python3',
    transcriberScriptPath:
      env.HUSHTYPE_TRANSCRIBER_SCRIPT ?? path.join(rootDir, 'python', 'transcribe_worker.py'),
    whisperModel: env.HUSHTYPE_WHISPER_MODEL ?? 'small.en',
    whisperDevice: env.HUSHTYPE_WHISPER_DEVICE ?? 'auto',
    whisperComputeType: env.HUSHTYPE_WHISPER_COMPUTE_TYPE ?? 'auto',
    whisperLanguage: env.HUSHTYPE_WHISPER_LANGUAGE || undefined,
    confidenceFloor: parseFloatOrDefault(env.HUSHTYPE_CONFIDENCE_FLOOR, -0.5),
    transcriptionTimeoutMs: parseIntOrDefault(env.HUSHTYPE_TRANSCRIPTION_TIMEOUT_MS, 60000),
    modelLoadTimeoutMs: parseIntOrDefault(env.HUSHTYPE_MODEL_LOAD_TIMEOUT_MS, 180000),
    correctionEnabled: parseBoolOrDefault(env.HUSHTYPE_CORRECTION_ENABLED, true),
    correctionModel: env.HUSHTYPE_CORRECTION_MODEL ?? 'llama3.2:3b',
    correctionStyle: resolveCorrectionStyle(env.HUSHTYPE_CORRECTION_STYLE),
    correctionTemperature: parseFloatOrDefault(env.HUSHTYPE_CORRECTION_TEMPERATURE, 0.2),
    ollamaHost: env.HUSHTYPE_OLLAMA_HOST ?? 'localhost',
    ollamaPort: parseIntOrDefault(env.HUSHTYPE_OLLAMA_PORT, 11434),
    correctionTimeoutMs: parseIntOrDefault(env.HUSHTYPE_CORRECTION_TIMEOUT_MS, 30000),
    correctionRetries: parseIntOrDefault(env.HUSHTYPE_CORRECTION_RETRIES, 3),
    correctionBackoffMs: parseIntOrDefault(env.HUSHTYPE_CORRECTION_BACKOFF_MS, 250),
    autoTypeEnabled: parseBoolOrDefault(env.HUSHTYPE_AUTO_TYPE, false),
    autoTypeMode: resolveAutoTypeMode(env.HUSHTYPE_AUTO_TYPE_MODE),
    autoTypeDelayMs: parseIntOrDefault(env.HUSHTYPE_AUTO_TYPE_DELAY_MS, 1000),
    autoTypeCharDelayMs: parseIntOrDefault(env.HUSHTYPE_AUTO_TYPE_CHAR_DELAY_MS, 20),
    autoTypeExcludedApps: parseListOrDefault(
      env.HUSHTYPE_AUTO_TYPE_EXCLUDED_APPS,
      DEFAULT_EXCLUDED_APPS
    ),
    keystrokeBackend: resolveKeystrokeBackend(env.HUSHTYPE_KEYSTROKE_BACKEND),
    copyToClipboard: parseBoolOrDefault(env.HUSHTYPE_COPY_TO_CLIPBOARD, true),
    logTranscriptions: parseBoolOrDefault(env.HUSHTYPE_LOG_TRANSCRIPTIONS, true),
    transcriptLogPath:
      env.HUSHTYPE_TRANSCRIPT_LOG ?? path.join(logDir, 'transcriptions.log'),
    logDir,
    logLevel: resolveLogLevel(env.HUSHTYPE_LOG_LEVEL)
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.hotkey.trim()) {
    errors.push('HUSHTYPE_HOTKEY must not be empty.');
  }

  if (config.hotkeyDebounceMs < 0 || config.hotkeyDebounceMs > 1000) {
    errors.push('HUSHTYPE_HOTKEY_DEBOUNCE_MS must be between 0 and 1000 milliseconds.');
  }

  if (!config.ffmpegBin.trim()) {
    errors.push('HUSHTYPE_FFMPEG_BIN must not be empty.');
  }

  if (!config.ffmpegInputFormat.trim()) {
    errors.push('HUSHTYPE_FFMPEG_FORMAT must not be empty.');
  }

  if (!config.ffmpegInput.trim()) {
    errors.push('HUSHTYPE_FFMPEG_INPUT must name a capture device on this platform.');
  }

  if (![8000, 16000, 22050, 44100, 48000].includes(config.sampleRate)) {
    errors.push('HUSHTYPE_SAMPLE_RATE must be one of: 8000, 16000, 22050, 44100, 48000.');
  }

  if (config.channels < 1 || config.channels > 2) {
    errors.push('HUSHTYPE_CHANNELS must be 1 or 2.');
  }

  if (config.levelIntervalMs < 20 || config.levelIntervalMs > 1000) {
    errors.push('HUSHTYPE_LEVEL_INTERVAL_MS must be between 20 and 1000 milliseconds.');
  }

  if (config.minRecordingMs < 0 || config.minRecordingMs > 10000) {
    errors.push('HUSHTYPE_MIN_RECORDING_MS must be between 0 and 10000 milliseconds.');
  }

  if (config.silencePeakThreshold < 0 || config.silencePeakThreshold > 32767) {
    errors.push('HUSHTYPE_SILENCE_PEAK_THRESHOLD must be between 0 and 32767.');
  }

  if (!config.pythonBin.trim()) {
    errors.push('HUSHTYPE_PYTHON_BIN must not be empty.');
  }

  if (!config.whisperModel.trim()) {
    errors.push('HUSHTYPE_WHISPER_MODEL must not be empty.');
  }

  if (config.transcriptionTimeoutMs < 1000 || config.transcriptionTimeoutMs > 600000) {
    errors.push('HUSHTYPE_TRANSCRIPTION_TIMEOUT_MS must be between 1000 and 600000 milliseconds.');
  }

  if (config.modelLoadTimeoutMs < 1000 || config.modelLoadTimeoutMs > 1800000) {
    errors.push('HUSHTYPE_MODEL_LOAD_TIMEOUT_MS must be between 1000 and 1800000 milliseconds.');
  }

  if (config.correctionEnabled && !config.correctionModel.trim()) {
    errors.push('HUSHTYPE_CORRECTION_MODEL must not be empty when correction is enabled.');
  }

  if (config.correctionTemperature < 0 || config.correctionTemperature > 2) {
    errors.push('HUSHTYPE_CORRECTION_TEMPERATURE must be between 0 and 2.');
  }

  if (!config.ollamaHost.trim()) {
    errors.push('HUSHTYPE_OLLAMA_HOST must not be empty.');
  }

  if (config.ollamaPort < 1 || config.ollamaPort > 65535) {
    errors.push('HUSHTYPE_OLLAMA_PORT must be between 1 and 65535.');
  }

  if (config.correctionTimeoutMs < 500 || config.correctionTimeoutMs > 300000) {
    errors.push('HUSHTYPE_CORRECTION_TIMEOUT_MS must be between 500 and 300000 milliseconds.');
  }

  if (config.correctionRetries < 0 || config.correctionRetries > 8) {
    errors.push('HUSHTYPE_CORRECTION_RETRIES must be between 0 and 8.');
  }

  if (config.correctionBackoffMs < 0 || config.correctionBackoffMs > 10000) {
    errors.push('HUSHTYPE_CORRECTION_BACKOFF_MS must be between 0 and 10000 milliseconds.');
  }

  if (config.autoTypeDelayMs < 0 || config.autoTypeDelayMs > 10000) {
    errors.push('HUSHTYPE_AUTO_TYPE_DELAY_MS must be between 0 and 10000 milliseconds.');
  }

  if (config.autoTypeCharDelayMs < 0 || config.autoTypeCharDelayMs > 1000) {
    errors.push('HUSHTYPE_AUTO_TYPE_CHAR_DELAY_MS must be between 0 and 1000 milliseconds.');
  }

  if (config.logTranscriptions && !config.transcriptLogPath.trim()) {
    errors.push('HUSHTYPE_TRANSCRIPT_LOG must not be empty when transcript logging is enabled.');
  }

  return errors;
};
