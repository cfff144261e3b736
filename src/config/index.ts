/**
 * Configuration management with environment variable validation
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

// Load .env file if it exists
dotenv.config();

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD');

/**
 * Environment variable schema
 */
const EnvSchema = z.object({
  // Rapras credentials
  RAPRAS_USERNAME: z.string().min(1),
  RAPRAS_PASSWORD: z.string().min(1),

  // Yahoo Auctions (SMS login through the proxy)
  YAHOO_PHONE_NUMBER: z.string().min(1),
  PROXY_URL: z.string().url(),
  PROXY_USERNAME: z.string().min(1),
  PROXY_PASSWORD: z.string().min(1),

  // Session persistence
  SESSION_DIR: z.string().min(1).default('sessions'),
  SESSION_ENCRYPTION_KEY: z.string().min(1),

  // Classifier provider settings
  AI_PROVIDER: z.enum(['openai', 'openrouter']).default('openai'),
  AI_MODEL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),

  // Run window for the seller listing
  START_DATE: IsoDate,
  END_DATE: IsoDate,

  OUTPUT_DIR: z.string().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Node environment
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production')
});

type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Application configuration
 */
export interface AppConfig {
  rapras: {
    username: string;
    password: string;
  };
  yahoo: {
    phoneNumber: string;
  };
  proxy: {
    url: string;
    username: string;
    password: string;
  };
  session: {
    dir: string;
    encryptionKey: string;
  };
  classifier: {
    provider: 'openai' | 'openrouter';
    apiKey: string;
    model?: string;
  };
  window: {
    startDate: string;
    endDate: string;
  };
  outputDir?: string;

  // System settings
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  nodeEnv: 'development' | 'test' | 'production';
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
}

class Configuration {
  private config?: AppConfig;

  /**
   * Load and validate configuration
   */
  load(env: NodeJS.ProcessEnv = process.env): AppConfig {
    if (this.config) {
      return this.config;
    }

    const result = EnvSchema.safeParse(env);

    if (!result.success) {
      const missing = result.error.errors
        .filter((err) => err.message === 'Required')
        .map((err) => err.path.join('.'));

      const invalid = result.error.errors
        .filter((err) => err.message !== 'Required')
        .map((err) => `${err.path.join('.')}: ${err.message}`);

      let message = 'Invalid configuration:';
      if (missing.length > 0) {
        message += `\nMissing required variables: ${missing.join(', ')}`;
      }
      if (invalid.length > 0) {
        message += `\nInvalid variables: ${invalid.join('; ')}`;
      }

      throw new ConfigurationError(message, missing);
    }

    this.config = this.build(result.data);
    return this.config;
  }

  private build(env: EnvConfig): AppConfig {
    const provider = env.AI_PROVIDER;
    const apiKey = provider === 'openrouter' ? env.OPENROUTER_API_KEY : env.OPENAI_API_KEY;

    if (!apiKey) {
      const variable = provider === 'openrouter' ? 'OPENROUTER_API_KEY' : 'OPENAI_API_KEY';
      throw new ConfigurationError(`${variable} is required when AI_PROVIDER=${provider}`, [
        variable
      ]);
    }

    if (env.START_DATE > env.END_DATE) {
      throw new ConfigurationError(
        `START_DATE (${env.START_DATE}) must not be after END_DATE (${env.END_DATE})`
      );
    }

    return {
      rapras: {
        username: env.RAPRAS_USERNAME,
        password: env.RAPRAS_PASSWORD
      },
      yahoo: {
        phoneNumber: env.YAHOO_PHONE_NUMBER
      },
      proxy: {
        url: env.PROXY_URL,
        username: env.PROXY_USERNAME,
        password: env.PROXY_PASSWORD
      },
      session: {
        dir: env.SESSION_DIR,
        encryptionKey: env.SESSION_ENCRYPTION_KEY
      },
      classifier: {
        provider,
        apiKey,
        model: env.AI_MODEL
      },
      window: {
        startDate: env.START_DATE,
        endDate: env.END_DATE
      },
      outputDir: env.OUTPUT_DIR,
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test'
    };
  }

  /**
   * Validate configuration without throwing
   */
  validate(env: NodeJS.ProcessEnv = process.env): { valid: boolean; errors?: string[] } {
    try {
      this.load(env);
      return { valid: true };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return {
          valid: false,
          errors: [error.message, ...(error.missingFields || [])]
        };
      }
      return { valid: false, errors: [String(error)] };
    }
  }

  /**
   * Configuration with every secret redacted, safe to log
   */
  redacted(): Record<string, unknown> {
    const config = this.load();
    return {
      ...config,
      rapras: { username: config.rapras.username, password: redactSecret(config.rapras.password) },
      yahoo: { phoneNumber: redactSecret(config.yahoo.phoneNumber) },
      proxy: {
        url: config.proxy.url,
        username: config.proxy.username,
        password: redactSecret(config.proxy.password)
      },
      session: {
        dir: config.session.dir,
        encryptionKey: redactSecret(config.session.encryptionKey)
      },
      classifier: { ...config.classifier, apiKey: redactSecret(config.classifier.apiKey) }
    };
  }
}

export function redactSecret(secret: string): string {
  if (secret.length <= 8) {
    return '***';
  }
  return `${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
}

// Export singleton instance
export const config = new Configuration();

export function loadConfig(): AppConfig {
  return config.load();
}

export function validateConfig(): { valid: boolean; errors?: string[] } {
  return config.validate();
}

export { Configuration };
export * from './yaml-loader';
export * from './yaml-types';
