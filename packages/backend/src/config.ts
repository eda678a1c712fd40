export interface AppConfig {
  port: number;
  uploadDir: string;
  maxFileSize: number; // bytes
  device: {
    adbPath: string;
    remoteLogPath: string;
  };
}

export const DEFAULT_REMOTE_LOG_PATH = '/data/misc/critical-events/critical_event_log.pb';

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export function loadConfig(): AppConfig {
  return {
    port: parseInt(env('PORT', '8000'), 10),
    uploadDir: env('UPLOAD_DIR', '/tmp/critical-events-uploads'),
    maxFileSize: parseInt(env('MAX_FILE_SIZE', String(16 * 1024 * 1024)), 10), // 16MB

    device: {
      adbPath: env('ADB_PATH', 'adb'),
      remoteLogPath: env('DEVICE_LOG_PATH', DEFAULT_REMOTE_LOG_PATH),
    },
  };
}

let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}
