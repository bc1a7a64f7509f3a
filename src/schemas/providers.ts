/**
 * JSON Schemas for upstream provider payloads.
 * Only the fields the service reads are described; everything else is ignored.
 */

/** GET /products/{product}/ticker */
export interface CoinbaseTickerOutput {
  price: string;
  time?: string;
}

export const CoinbaseTickerSchema = {
  type: 'object',
  required: ['price'],
  properties: {
    price: { type: 'string', minLength: 1 },
    time: { type: 'string' }
  }
} as const;

/** GET /products/{product}/book?level=1; levels are [price, size, num-orders] */
export interface CoinbaseBookOutput {
  bids: Array<Array<string | number>>;
  asks: Array<Array<string | number>>;
}

const BookSideSchema = {
  type: 'array',
  minItems: 1,
  items: {
    type: 'array',
    minItems: 2,
    items: { type: ['string', 'number'] }
  }
} as const;

export const CoinbaseBookSchema = {
  type: 'object',
  required: ['bids', 'asks'],
  properties: {
    bids: BookSideSchema,
    asks: BookSideSchema
  }
} as const;

/** GET /simple/price?ids={id}&vs_currencies=usd */
export type CoinGeckoSimplePriceOutput = Record<string, { usd: number }>;

export const CoinGeckoSimplePriceSchema = {
  type: 'object',
  additionalProperties: {
    type: 'object',
    required: ['usd'],
    properties: {
      usd: { type: 'number' }
    }
  }
} as const;

/** GET /coins/{id}/market_chart; prices are [epoch ms, price] */
export interface CoinGeckoMarketChartOutput {
  prices: number[][];
}

export const CoinGeckoMarketChartSchema = {
  type: 'object',
  required: ['prices'],
  properties: {
    prices: {
      type: 'array',
      items: {
        type: 'array',
        minItems: 2,
        items: { type: 'number' }
      }
    }
  }
} as const;

/** Article shape shared by NewsAPI and GNews */
export interface ArticleOutput {
  title?: string | null;
  url?: string | null;
  publishedAt?: string | null;
  source?: { name?: string | null } | null;
}

const ArticleSchema = {
  type: 'object',
  properties: {
    title: { type: ['string', 'null'] },
    url: { type: ['string', 'null'] },
    publishedAt: { type: ['string', 'null'] },
    source: {
      type: ['object', 'null'],
      properties: {
        name: { type: ['string', 'null'] }
      }
    }
  }
} as const;

/** GET /v2/everything (NewsAPI) and GET /api/v4/search (GNews) */
export interface ArticleListOutput {
  articles: ArticleOutput[];
}

export const ArticleListSchema = {
  type: 'object',
  required: ['articles'],
  properties: {
    articles: { type: 'array', items: ArticleSchema }
  }
} as const;

/** Envelope of every Telegram Bot API response */
export interface TelegramResponseOutput {
  ok: boolean;
  description?: string;
}

export const TelegramResponseSchema = {
  type: 'object',
  required: ['ok'],
  properties: {
    ok: { type: 'boolean' },
    description: { type: 'string' }
  }
} as const;
