import { z } from 'zod';

const PricePointSchema = z.tuple([z.number(), z.number().nullable()]);

/** `GET /coins/{id}/market_chart` */
export const MarketChartResponseSchema = z.object({
  prices: z.array(PricePointSchema),
  market_caps: z.array(PricePointSchema).optional(),
  total_volumes: z.array(PricePointSchema).optional(),
});

export type MarketChartResponse = z.infer<typeof MarketChartResponseSchema>;
