import { Request, Response, NextFunction } from 'express';
import * as logger from 'firebase-functions/logger';

// API_KEY is provided to the function as a secret

export const validateApiKey = (req: Request, res: Response, next: NextFunction): void => {
  const header = req.headers['x-api-key'];
  const apiKey = Array.isArray(header) ? header[0] : header;
  const validApiKey = process.env.API_KEY;

  if (!validApiKey) {
    logger.error('API_KEY environment variable not set');
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'API key not configured',
    });
    return;
  }

  if (!apiKey || apiKey !== validApiKey) {
    res.status(403).json({
      error: 'Forbidden',
      message: 'Invalid or missing API key',
    });
    return;
  }

  next();
};
