import { Router } from 'express';
import { ConnectionFactory } from '../lib/database';
import { TokenService } from '../services/token.service';
import { AuthService } from '../services/auth.service';
import { DealerRepository } from '../repositories/dealer.repository';
import { CarRepository } from '../repositories/car.repository';
import { createAuthController } from '../controllers/auth.controller';
import { createCarController } from '../controllers/car.controller';
import { authenticate } from '../middleware/auth';
import { createAuthRoutes } from './auth.routes';
import { createCarRoutes } from './car.routes';

export interface ApiDependencies {
  connections: ConnectionFactory;
  tokens: TokenService;
}

export const createApiRouter = ({ connections, tokens }: ApiDependencies) => {
  const router = Router();

  const authService = new AuthService(new DealerRepository(connections), tokens);
  const carController = createCarController(new CarRepository(connections));

  router.use('/auth', createAuthRoutes(createAuthController(authService)));
  router.use('/cars', createCarRoutes(carController, authenticate(tokens)));

  router.get('/', (req, res) => {
    res.json({
      message: 'Dealer Stock API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        auth: '/api/auth (login)',
        cars: '/api/cars (list, add, delete, stock, search)',
      },
    });
  });

  return router;
};
