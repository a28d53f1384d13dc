import log from 'electron-log/node';
import type { LoggingConfig } from '@shared/types/batch-rename';

// 日志文件默认位置:
// macOS: ~/Library/Logs/batch-renamer/main.log
// Windows: %USERPROFILE%\AppData\Roaming\batch-renamer\logs\main.log
// Linux: ~/.config/batch-renamer/logs/main.log
log.transports.file.level = 'info';
log.transports.console.level = 'info';

export function configureLogging(config: LoggingConfig): void {
  log.transports.console.level = config.level;
  log.transports.file.level = config.file ? config.level : false;
}

export function getLogger(scope: string) {
  return log.scope(scope);
}
