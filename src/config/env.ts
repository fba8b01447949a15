import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Crawling
  CRAWL_STRATEGY: process.env.CRAWL_STRATEGY || 'intelligent',
  MAX_PAGES_PER_SITE: parseInt(process.env.MAX_PAGES_PER_SITE || '10', 10),
  INTRA_DOMAIN_DELAY_MS: parseInt(process.env.INTRA_DOMAIN_DELAY_MS || '1000', 10),
  INTER_DOMAIN_DELAY_MS: parseInt(process.env.INTER_DOMAIN_DELAY_MS || '2000', 10),
  REQUEST_TIMEOUT_MS: parseInt(process.env.REQUEST_TIMEOUT_MS || '30000', 10),
  RESPECT_ROBOTS_TXT: process.env.RESPECT_ROBOTS_TXT === 'true', // Default false
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; OpennessCrawler/1.0)',

  // Rendering backend (Jina Reader, falls back to plain HTTP)
  RENDERER_ENABLED: process.env.RENDERER_ENABLED === 'true', // Default false
  JINA_READER_URL: process.env.JINA_READER_URL || 'https://r.jina.ai',
  JINA_TIMEOUT: parseInt(process.env.JINA_TIMEOUT || '15000', 10),

  // Evaluation
  CONFIDENCE_THRESHOLD: parseFloat(process.env.CONFIDENCE_THRESHOLD || '0.5'),
  CASE_SENSITIVE: process.env.CASE_SENSITIVE === 'true', // Default false
  CATALOG_DIR: process.env.CATALOG_DIR || 'criteria',

  // LLM (OpenAI-compatible endpoint)
  LLM_ENABLED: process.env.LLM_ENABLED !== 'false', // Default true
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || undefined,
  OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4.1-mini',
  LLM_TIMEOUT: parseInt(process.env.LLM_TIMEOUT || '60000', 10),
  LLM_TEMPERATURE: parseFloat(process.env.LLM_TEMPERATURE || '0.3'),
  LLM_MAX_TOKENS: parseInt(process.env.LLM_MAX_TOKENS || '1000', 10),
} as const;

export default env;
