import log from 'electron-log/node';

const LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

type Level = typeof LEVELS[number] | false;

function levelFromEnv(value: string | undefined, fallback: Level): Level {
    if (value === 'false' || value === 'off') return false;
    const match = LEVELS.find(level => level === value);
    return match ?? fallback;
}

// Configure logging
log.transports.console.level = levelFromEnv(process.env.BENCHWIRE_LOG_LEVEL, 'info');

// File output only when a destination is given explicitly
const logFile = process.env.BENCHWIRE_LOG_FILE;
if (logFile) {
    log.transports.file.level = levelFromEnv(process.env.BENCHWIRE_LOG_FILE_LEVEL, 'debug');
    log.transports.file.resolvePathFn = () => logFile;
} else {
    log.transports.file.level = false;
}

log.variables.process = 'benchwire';

export default log;
