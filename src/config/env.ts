import { config } from 'dotenv';
import { z } from 'zod';

config();

const countryList = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(code => code.trim().toUpperCase())
      .filter(code => code.length > 0)
  )
  .pipe(z.array(z.string().regex(/^[A-Z]{2}$/, 'Expected two-letter country codes')));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).pipe(z.number().min(1).max(65535)).default('8080'),
  DATABASE_URL: z.string().url(),
  TMDB_API_KEY: z.string().min(1),
  TMDB_BASE_URL: z.string().url().default('https://api.themoviedb.org/3'),
  TMDB_RPS: z.string().transform(Number).pipe(z.number().positive()).default('4'),
  TMDB_BURST: z.string().transform(Number).pipe(z.number().int().min(1)).default('4'),
  UPSTREAM_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('10000'),
  UPSTREAM_MAX_RETRIES: z.string().transform(Number).pipe(z.number().int().min(0).max(10)).default('2'),
  FILM_CACHE_TTL_HOURS: z.string().transform(Number).pipe(z.number().positive()).default('168'),
  RELEASE_CACHE_TTL_HOURS: z.string().transform(Number).pipe(z.number().positive()).default('6'),
  MAX_CONCURRENT_REQUESTS: z.string().transform(Number).pipe(z.number().int().min(1).max(50)).default('5'),
  COUNTRY_FALLBACK: countryList.default('US'),
  RECENCY_WINDOW_DAYS: z.string().transform(Number).pipe(z.number().int().min(0)).default('0'),
  LETTERBOXD_DELAY_MS: z.string().transform(Number).pipe(z.number().int().min(0)).default('250'),
  WATCHLIST_MAX_PAGES: z.string().transform(Number).pipe(z.number().int().min(1)).default('50'),
  RATE_LIMIT_WINDOW_MS: z.string().transform(Number).pipe(z.number().positive()).default('60000'),
  RATE_LIMIT_MAX: z.string().transform(Number).pipe(z.number().positive()).default('120'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

let env: Env;

try {
  env = envSchema.parse(process.env);
} catch (error) {
  if (error instanceof z.ZodError) {
    console.error('❌ Invalid environment variables:');
    error.errors.forEach((err) => {
      console.error(`${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }
  throw error;
}

export { env };
