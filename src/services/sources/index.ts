import { AxiosInstance } from 'axios';
import { logInfo } from '../../utils/logger';
import { GoogleFactCheckAdapter } from './googleFactCheck';
import { NewsApiAdapter } from './newsApi';
import { SourceAdapter } from './sourceAdapter';
import { TavilyAdapter } from './tavily';
import { WikipediaAdapter } from './wikipedia';

export interface SourceKeys {
  googleFactCheckApiKey?: string;
  newsApiKey?: string;
  tavilyApiKey?: string;
}

/** Wikipedia is always available; keyed providers join when their key is configured. */
export function createSourceAdapters(keys: SourceKeys, http?: AxiosInstance): SourceAdapter[] {
  const adapters: SourceAdapter[] = [new WikipediaAdapter({ http })];
  if (keys.googleFactCheckApiKey) {
    adapters.push(new GoogleFactCheckAdapter({ apiKey: keys.googleFactCheckApiKey, http }));
  }
  if (keys.newsApiKey) {
    adapters.push(new NewsApiAdapter({ apiKey: keys.newsApiKey, http }));
  }
  if (keys.tavilyApiKey) {
    adapters.push(new TavilyAdapter({ apiKey: keys.tavilyApiKey, http }));
  }
  logInfo('Sources', `Evidence adapters enabled: ${adapters.map(adapter => adapter.id).join(', ')}`);
  return adapters;
}

export type { SearchBudget, SourceAdapter } from './sourceAdapter';
