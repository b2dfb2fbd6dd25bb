import { z } from 'zod';

export const YEAR_MIN = 1900;
export const YEAR_MAX = 2024;

// Upper bound of the INTEGER columns
export const INT_MAX = 2147483647;

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required.` })
    .trim()
    .min(1, `${field} is required.`)
    .max(50, `${field} can't be longer than 50 characters.`);

const stockLevel = (field: string) =>
  z
    .number({ required_error: `${field} is required.` })
    .int(`${field} must be a whole number.`)
    .min(0, 'Stock level must be a positive number.')
    .max(INT_MAX, `${field} can't be greater than ${INT_MAX}.`);

const carId = z
  .number({ required_error: 'Id is required.' })
  .int('Id must be a whole number.')
  .positive('Id must be a positive number.')
  .max(INT_MAX, `Id can't be greater than ${INT_MAX}.`);

export const addCarSchema = z.object({
  Make: requiredText('Make'),
  Model: requiredText('Model'),
  Year: z
    .number({ required_error: 'Year is required.' })
    .int('Year must be a whole number.')
    .min(YEAR_MIN, `Year must be between ${YEAR_MIN} and ${YEAR_MAX}.`)
    .max(YEAR_MAX, `Year must be between ${YEAR_MIN} and ${YEAR_MAX}.`),
  StockLevel: stockLevel('StockLevel'),
});

export const deleteCarSchema = z.object({
  Id: carId,
});

export const updateStockSchema = z.object({
  Id: carId,
  NewStockLevel: stockLevel('NewStockLevel'),
});

const optionalFilter = (field: string) =>
  z
    .string()
    .trim()
    .max(50, `${field} can't be longer than 50 characters.`)
    .nullish()
    .transform((value) => value || undefined);

export const searchCarSchema = z.object({
  Make: optionalFilter('Make'),
  Model: optionalFilter('Model'),
});

export type AddCarRequest = z.infer<typeof addCarSchema>;
export type DeleteCarRequest = z.infer<typeof deleteCarSchema>;
export type UpdateStockRequest = z.infer<typeof updateStockSchema>;
export type SearchCarRequest = z.infer<typeof searchCarSchema>;
