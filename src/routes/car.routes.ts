import { Router, RequestHandler } from 'express';
import { CarController } from '../controllers/car.controller';

export const createCarRoutes = (carController: CarController, authenticate: RequestHandler) => {
  const router = Router();

  // All routes require authentication
  router.use(authenticate);

  // List the dealer's cars
  router.get('/', carController.getCars);

  // Add a car
  router.post('/', carController.create);

  // Delete a car
  router.delete('/', carController.delete);

  // Update stock level
  router.put('/stock', carController.updateStock);

  // Search by make/model
  router.post('/search', carController.search);

  return router;
};
