import cors from 'cors';
import { env } from '../config/env.js';

/**
 * CORS configuration; the API is read-only
 */
export const corsMiddleware = cors({
  origin: env.CORS_ORIGIN,
  credentials: false,
  methods: ['GET', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  optionsSuccessStatus: 200,
});
