// ============================================================
// Identity Graph Engine — HTTP pipeline setup
//
// Security headers, CORS, validation, response envelope and
// error filter. Shared by main.ts and the integration tests;
// both create the app with `rawBody: true` for POST /api/ingest.
// ============================================================
import { INestApplication, Logger, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { API_KEY_HEADER } from './common/guards/api-key.guard';
import { Settings } from './config/settings';

export function configureApp(app: INestApplication, settings: Settings): void {
  const logger = new Logger('IdentityGraph');

  // ── Security Headers ────────────────────────────────────
  app.use(helmet());

  // ── CORS ────────────────────────────────────────────────
  // Production: configured origins only
  // Development: allow all origins for local testing
  const allowedOrigins = settings.corsOrigins;
  app.enableCors({
    origin: settings.isProduction
      ? (origin, callback) => {
          if (!origin || allowedOrigins.includes(origin)) {
            callback(null, true);
          } else {
            logger.warn(`CORS blocked: ${origin}`);
            callback(null, false);
          }
        }
      : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', API_KEY_HEADER],
  });

  // ── Validation ──────────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
    }),
  );

  app.useGlobalInterceptors(new ResponseInterceptor());
  app.useGlobalFilters(new HttpExceptionFilter());
}
