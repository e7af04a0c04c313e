import pino from 'pino';
import { cfg } from '../config/index.js';

const redact = ['accessToken', 'password', 'totpSecret'];
export const logger = pino(
  cfg.logPretty
    ? { level: cfg.logLevel, redact, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : { level: cfg.logLevel, redact }
);
