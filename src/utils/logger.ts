/*
 * logger for the client core.  LOG_LEVEL sets the threshold; warnings and
 * errors go to stderr so they stay out of anything reading stdout
 */

import * as W from 'winston'

const stderrLevels = ['error', 'warn'];

const log = W.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  defaultMeta: {component: 'dispatch'},
  format: W.format.combine(
    W.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    W.format.errors({
      stack: true
    }),
    W.format.json(),
  ),
  transports: [],
});

if (process.env.NODE_ENV === 'production') {
  log.add(new W.transports.Console({stderrLevels}));
} else {
  log.add(new W.transports.Console({
    stderrLevels,
    format: W.format.combine(
      W.format.colorize(),
      W.format.simple(),
    ),
  }));
}

export default log;
