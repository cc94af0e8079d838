//src/config/env.validation.ts
import * as Joi from 'joi';

export const envValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(3000),
  // A file path, or :memory: for a throwaway database
  DATABASE_URL: Joi.string().default('sponsorship.db'),
  DATABASE_MIGRATIONS_DIR: Joi.string().default('drizzle'),
  // Shared with the identity provider that signs access tokens
  JWT_SECRET: Joi.string().required(),
  INTERNAL_API_KEY: Joi.string().required(),
});
