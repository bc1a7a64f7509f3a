/**
 * News Adapters Index
 *
 * Exports all news adapter implementations
 */

export * from './base-news-adapter';
export * from './newsapi-adapter';
export * from './gnews-adapter';
