import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import cookieParser from 'cookie-parser';
import { AppConfig } from './config';
import { ConnectionFactory } from './lib/database';
import { TokenService } from './services/token.service';
import { createApiRouter } from './routes';

export interface AppDependencies {
  config: Readonly<AppConfig>;
  connections: ConnectionFactory;
}

const isJsonSyntaxError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'body' in err;

/** 4xx errors raised by body-parser (http-errors with `expose: true`). */
const clientErrorStatus = (err: unknown): number | null => {
  if (!(err instanceof Error) || !('status' in err) || !('expose' in err)) {
    return null;
  }
  const { status, expose } = err;
  return typeof status === 'number' && status >= 400 && status < 500 && expose === true ? status : null;
};

export const createApp = ({ config, connections }: AppDependencies) => {
  const app = express();
  const tokens = new TokenService(config.jwt);

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin, credentials: true }));
  if (config.logRequests) {
    app.use(morgan('dev'));
  }
  app.use(cookieParser());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({ status: 'OK', message: 'Dealer Stock API is running' });
  });

  // API Routes
  app.use('/api', createApiRouter({ connections, tokens }));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ message: 'Route not found' });
  });

  // Error handler
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (isJsonSyntaxError(err)) {
      res.status(400).json({ message: 'Malformed JSON body' });
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== null && err instanceof Error) {
      res.status(status).json({ message: err.message });
      return;
    }

    console.error(err instanceof Error ? err.stack : err);
    res.status(500).json({
      message: 'Something went wrong!',
      error: config.nodeEnv === 'development' && err instanceof Error ? err.message : undefined,
    });
  });

  return app;
};
