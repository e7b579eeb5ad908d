import { Request } from 'express';
import { ValidationError } from '@/errors';

/**
 * Route parameter that the router guarantees, e.g. ":id"
 */
export function routeParam(req: Request, name: string): string {
  const value = req.params[name];
  if (value === undefined || value.trim() === '') {
    throw new ValidationError(`Missing route parameter: ${name}`);
  }
  return value;
}
