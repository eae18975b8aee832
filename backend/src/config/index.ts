import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().default('logs'),

  // Attachment storage
  MEDIA_ROOT: z.string().default('./media'),
  MEDIA_URL: z.string().default('/media/'),

  // Time zones
  TIME_ZONE: z.string().default('Europe/London'),
  DISPLAY_TIME_ZONE: z.string().default('Europe/London'),

  // Direction detection
  MEMBER_ENQUIRIES_EMAIL: z.string().default('memberenquiries@redcar-cleveland.gov.uk'),

  // Message container limits
  EMAIL_MAX_SIZE_MB: z.string().default('50'),

  // Image resizing
  IMAGE_MAX_SIZE_MB: z.string().default('2'),
  IMAGE_MAX_DIMENSION: z.string().default('2048'),
  IMAGE_QUALITY: z.string().default('85'),

  // Database (member directory / enquiry store)
  DATABASE_URL: z.string().optional(),
});

// Parse and validate environment variables
const env = envSchema.parse(process.env);

// Export typed configuration
export const config = {
  env: env.NODE_ENV,

  logLevel: env.LOG_LEVEL,
  logDir: env.LOG_DIR,

  media: {
    root: env.MEDIA_ROOT,
    url: env.MEDIA_URL,
  },

  timeZones: {
    local: env.TIME_ZONE,
    display: env.DISPLAY_TIME_ZONE,
  },

  memberEnquiriesEmail: env.MEMBER_ENQUIRIES_EMAIL.toLowerCase(),

  containers: {
    maxSizeMb: parseFloat(env.EMAIL_MAX_SIZE_MB) || 50,
  },

  images: {
    maxSizeMb: parseFloat(env.IMAGE_MAX_SIZE_MB) || 2,
    maxDimension: parseInt(env.IMAGE_MAX_DIMENSION, 10) || 2048,
    quality: parseInt(env.IMAGE_QUALITY, 10) || 85,
  },

  databaseUrl: env.DATABASE_URL,
};

export type AppConfig = typeof config;
