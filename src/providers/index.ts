export {
  ProviderError,
  normalizeTicker,
  type MarketDataProvider,
} from './types.ts';
export { YahooProvider, createYahooClient, type YahooClient } from './yahoo.ts';
export { JsonFileProvider, parseCompanyFinancials } from './json-file.ts';
export { CachedProvider } from './cached.ts';
