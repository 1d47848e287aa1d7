import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';

// stderr keeps stdout free for command output; LOG_FILE adds a second sink.
// Targets take everything the logger emits, LOG_LEVEL filters upstream.
const targets: pino.TransportTargetOptions[] = [
  { target: 'pino/file', level: 'trace', options: { destination: 2 } },
];
if (process.env.LOG_FILE) {
  targets.push({
    target: 'pino/file',
    level: 'trace',
    options: { destination: process.env.LOG_FILE, mkdir: true },
  });
}

export const logger = pino({
  name: 'datacloud',
  level,
  transport: { targets },
  redact: {
    paths: [
      'headers.Authorization',
      '*.access_token',
      '*.assertion',
      '*.subject_token',
      '*.privateKey',
    ],
    censor: '[REDACTED]',
  },
});
