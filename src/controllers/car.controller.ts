import { Request, Response } from 'express';
import { dealerIdOf } from '../middleware/auth';
import { CarRepository } from '../repositories/car.repository';
import {
  addCarSchema,
  deleteCarSchema,
  searchCarSchema,
  updateStockSchema,
  validate,
} from '../validators';

const CAR_NOT_FOUND = 'Car not found';

export const createCarController = (cars: CarRepository) => ({
  /**
   * Get all cars for the current dealer
   */
  async getCars(req: Request, res: Response): Promise<void> {
    try {
      const list = await cars.listByDealer(dealerIdOf(req));
      if (list.length === 0) {
        res.status(404).json({ message: 'No cars found' });
        return;
      }

      res.json(list);
    } catch (error) {
      console.error('Error fetching cars:', error);
      res.status(500).json({ message: 'Failed to fetch cars' });
    }
  },

  /**
   * Add a car owned by the current dealer
   */
  async create(req: Request, res: Response): Promise<void> {
    try {
      const dealerId = dealerIdOf(req);

      const parsed = validate(addCarSchema, req.body);
      if (!parsed.ok) {
        res.status(400).json(parsed.error);
        return;
      }

      const inserted = await cars.insert({ ...parsed.value, DealerId: dealerId });
      if (inserted !== 1) {
        res.status(500).json({ message: 'Failed to add car' });
        return;
      }

      res.json({ message: 'Car added successfully' });
    } catch (error) {
      console.error('Error creating car:', error);
      res.status(500).json({ message: 'Failed to add car' });
    }
  },

  /**
   * Delete a car. A car owned by another dealer is reported as missing.
   */
  async delete(req: Request, res: Response): Promise<void> {
    try {
      const dealerId = dealerIdOf(req);

      const parsed = validate(deleteCarSchema, req.body);
      if (!parsed.ok) {
        res.status(400).json(parsed.error);
        return;
      }

      const deleted = await cars.deleteOwned(parsed.value.Id, dealerId);
      if (deleted === 0) {
        res.status(404).json({ message: CAR_NOT_FOUND });
        return;
      }

      res.json({ message: 'Car deleted successfully' });
    } catch (error) {
      console.error('Error deleting car:', error);
      res.status(500).json({ message: 'Failed to delete car' });
    }
  },

  async updateStock(req: Request, res: Response): Promise<void> {
    try {
      const dealerId = dealerIdOf(req);

      const parsed = validate(updateStockSchema, req.body);
      if (!parsed.ok) {
        res.status(400).json(parsed.error);
        return;
      }

      const { Id, NewStockLevel } = parsed.value;
      const updated = await cars.updateStockOwned(Id, dealerId, NewStockLevel);
      if (updated === 0) {
        res.status(404).json({ message: CAR_NOT_FOUND });
        return;
      }

      res.json({ message: 'Stock level updated successfully' });
    } catch (error) {
      console.error('Error updating stock level:', error);
      res.status(500).json({ message: 'Failed to update stock level' });
    }
  },

  /**
   * Search the current dealer's cars by make and/or model (case-insensitive)
   */
  async search(req: Request, res: Response): Promise<void> {
    try {
      const dealerId = dealerIdOf(req);

      const parsed = validate(searchCarSchema, req.body);
      if (!parsed.ok) {
        res.status(400).json(parsed.error);
        return;
      }

      const matches = await cars.search(dealerId, {
        make: parsed.value.Make,
        model: parsed.value.Model,
      });
      if (matches.length === 0) {
        res.status(404).json({ message: 'No cars found matching the criteria.' });
        return;
      }

      res.json(matches);
    } catch (error) {
      console.error('Error searching cars:', error);
      res.status(500).json({ message: 'Failed to search cars' });
    }
  },
});

export type CarController = ReturnType<typeof createCarController>;
