/**
 * Sentry instrumentation for the NestJS backend.
 * MUST be imported FIRST in main.ts — before any other imports.
 * Enabled only when SENTRY_DSN is set; opt-out via DISABLE_TELEMETRY.
 */
import * as Sentry from '@sentry/nestjs';
import * as os from 'os';

const sentryDsn = process.env.SENTRY_DSN;
const isProduction = process.env.NODE_ENV === 'production';
const telemetryDisabled = process.env.DISABLE_TELEMETRY === 'true';

if (sentryDsn && !telemetryDisabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: isProduction ? 'production' : 'development',
    tracesSampleRate: isProduction ? 0.1 : 1.0,
    initialScope: {
      tags: {
        deployment: os.hostname(),
      },
    },
  });
}
