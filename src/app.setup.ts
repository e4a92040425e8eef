import { ValidationPipe, type INestApplication } from '@nestjs/common';
import {
  ValidationHttpException,
  toValidationIssues,
} from './lib/errors/ValidationHttpException';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

// http(s)://localhost:<any>, http(s)://127.0.0.1:<any>, http(s)://[::1]:<any>
const LOCALHOST_ORIGIN = /^https?:\/\/(localhost|\[::1\]|127\.0\.0\.1)(:\d+)?$/;

/** CORS, the global ValidationPipe and shutdown hooks. Used by main.ts and the e2e specs. */
export function configureApp(app: INestApplication): INestApplication {
  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // Server-to-server callers (MCP clients, curl) send no Origin.
      if (origin == null || LOCALHOST_ORIGIN.test(origin)) {
        cb(null, true);
        return;
      }
      cb(new Error(`CORS: origin not allowed: ${origin}`));
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    credentials: false,
    maxAge: 86_400,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
      exceptionFactory: (errors) =>
        new ValidationHttpException(toValidationIssues(errors)),
    }),
  );

  app.enableShutdownHooks();
  return app;
}
