/**
 * Configuration Management Module
 *
 * Centralized configuration management with environment variable support
 * and validation
 */

import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors.js';

// Load environment variables:
// 1) parent directory .env (when started from backend/)
// 2) working directory .env
const parentEnvPath = path.resolve(process.cwd(), '..', '.env');
const localEnvPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(parentEnvPath)) {
  dotenv.config({ path: parentEnvPath });
}
dotenv.config({ path: localEnvPath });

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

/**
 * Application Configuration
 */
export interface Config {
  /** Server configuration */
  server: {
    /** Server port */
    port: number;
    /** Host */
    host: string;
    /** Node environment */
    env: string;
  };

  /** Text generation (Gemini) configuration */
  llm: {
    /** Provider id registered with the LLM client */
    provider: 'google';
    /** API key (GEMINI_API_KEY) */
    apiKey: string;
    /** API base URL */
    baseUrl: string;
    /** Model id */
    model: string;
    /** Temperature */
    temperature: number;
    /** Top P */
    topP: number;
    /** Top K */
    topK: number;
    /** Maximum output tokens */
    maxOutputTokens: number;
    /** Request timeout in milliseconds */
    timeoutMs: number;
  };

  /** Web search (Google Custom Search) configuration */
  search: {
    /** API key (GOOGLE_CSE_API_KEY) */
    apiKey: string;
    /** Search engine id (GOOGLE_CSE_ID) */
    engineId: string;
    /** API endpoint */
    baseUrl: string;
    /** Results per query when the caller does not say */
    defaultResults: number;
    /** Request timeout in milliseconds */
    timeoutMs: number;
  };

  /** Frontend configuration */
  frontend: {
    /** Frontend URL (for CORS) */
    url: string;
  };

  /** Logging configuration */
  logging: {
    level: LogLevelSetting;
    /** JSON-lines log file; empty disables persistence */
    filePath: string;
  };
}

/**
 * Get environment variable or fall back to default
 */
function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value;
}

/**
 * Get number from environment variable
 */
function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    console.warn(`[Config] Invalid number for ${key}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return num;
}

function normalizeLogLevel(value: string): LogLevelSetting {
  const normalized = value.trim().toLowerCase();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
  ) {
    return normalized;
  }
  console.warn(`[Config] Invalid log level "${value}", using default: info`);
  return 'info';
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return {
    server: {
      port: getEnvNumber('PORT', 3001),
      host: getEnvVar('HOST', '0.0.0.0'),
      env: getEnvVar('NODE_ENV', 'development'),
    },

    llm: {
      provider: 'google',
      apiKey: getEnvVar('GEMINI_API_KEY', '').trim(),
      baseUrl: getEnvVar('GEMINI_BASE_URL', 'https://generativelanguage.googleapis.com'),
      model: getEnvVar('AI_DEFAULT_MODEL', 'gemini-1.5-flash'),
      temperature: getEnvNumber('AI_TEMPERATURE', 5) / 10, // Convert to 0.0-1.0
      topP: getEnvNumber('AI_TOP_P', 95) / 100, // Convert to 0.00-1.00
      topK: getEnvNumber('AI_TOP_K', 64),
      maxOutputTokens: getEnvNumber('AI_MAX_TOKENS', 8192),
      timeoutMs: getEnvNumber('LLM_REQUEST_TIMEOUT_MS', 120000), // 2 minutes
    },

    search: {
      apiKey: getEnvVar('GOOGLE_CSE_API_KEY', '').trim(),
      engineId: getEnvVar('GOOGLE_CSE_ID', '').trim(),
      baseUrl: getEnvVar('GOOGLE_CSE_BASE_URL', 'https://www.googleapis.com/customsearch/v1'),
      defaultResults: clamp(getEnvNumber('SEARCH_DEFAULT_RESULTS', 5), 1, 10),
      timeoutMs: getEnvNumber('SEARCH_TIMEOUT_MS', 15000),
    },

    frontend: {
      url: getEnvVar('FRONTEND_URL', 'http://localhost:5173'),
    },

    logging: {
      level: normalizeLogLevel(getEnvVar('LOG_LEVEL', 'info')),
      filePath: getEnvVar('LOG_FILE_PATH', '').trim(),
    },
  };
}

/**
 * Global configuration instance
 */
export const config: Config = loadConfig();

/**
 * Validate configuration
 */
export function validateConfig(target: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!target.llm.apiKey) {
    errors.push('Missing Gemini API key (GEMINI_API_KEY)');
  }
  if (!target.search.apiKey) {
    errors.push('Missing Google Custom Search API key (GOOGLE_CSE_API_KEY)');
  }
  if (!target.search.engineId) {
    errors.push('Missing Google Custom Search engine id (GOOGLE_CSE_ID)');
  }
  if (target.llm.temperature < 0 || target.llm.temperature > 2) {
    errors.push(`AI_TEMPERATURE out of range: ${target.llm.temperature}`);
  }
  if (target.llm.maxOutputTokens <= 0) {
    errors.push(`AI_MAX_TOKENS must be positive: ${target.llm.maxOutputTokens}`);
  }
  if (target.server.port <= 0 || target.server.port > 65535) {
    errors.push(`PORT out of range: ${target.server.port}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Throw ConfigurationError listing every problem validateConfig() finds
 */
export function requireValidConfig(target: Config = config): void {
  const { valid, errors } = validateConfig(target);
  if (!valid) {
    throw new ConfigurationError(errors);
  }
}

/**
 * Print configuration (for debugging)
 */
export function printConfig(target: Config = config): void {
  console.log('\n=== Use-Case Studio Configuration ===\n');

  console.log('Server:');
  console.log(`  Port: ${target.server.port}`);
  console.log(`  Environment: ${target.server.env}\n`);

  console.log('LLM:');
  console.log(`  Provider: ${target.llm.provider}`);
  console.log(`  Model: ${target.llm.model}`);
  console.log(`  Base URL: ${target.llm.baseUrl}`);
  console.log(`  Temperature: ${target.llm.temperature}`);
  console.log(`  Max Tokens: ${target.llm.maxOutputTokens}`);
  console.log(`  API Key: ${target.llm.apiKey ? '[OK] Configured' : '[MISSING] Not configured'}\n`);

  console.log('Search:');
  console.log(`  Endpoint: ${target.search.baseUrl}`);
  console.log(`  Engine ID: ${target.search.engineId || '(not set)'}`);
  console.log(`  Default Results: ${target.search.defaultResults}`);
  console.log(`  API Key: ${target.search.apiKey ? '[OK] Configured' : '[MISSING] Not configured'}\n`);

  console.log('Logging:');
  console.log(`  Level: ${target.logging.level}`);
  console.log(`  File: ${target.logging.filePath || '(console only)'}`);

  console.log('\n=====================================\n');
}

// Export config singleton
export default config;
