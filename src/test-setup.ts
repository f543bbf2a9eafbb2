import { log, LogLevel } from 'crawlee';

log.setLevel(LogLevel.OFF);
