/**
 * @fileoverview Decoded documents shared by the query-core tests
 */

import type { MarketDocument } from '@gridfeed/contracts';

/**
 * One time series with three quarter-hour points.
 */
export function priceDocument(mrid = 'doc-1', start = '2018-09-30T22:00Z'): MarketDocument {
  return {
    type: 'Publication_MarketDocument',
    content: {
      m_rid: mrid,
      type: 'A44',
      time_series: [
        {
          m_rid: 1,
          currency_unit_name: 'EUR',
          period: [
            {
              time_interval: { start, end: '2018-09-30T23:00Z' },
              resolution: 'PT15M',
              point: [
                { position: 1, price_amount: 45.5 },
                { position: 2, price_amount: 46 },
                { position: 3, price_amount: 47.25 },
              ],
            },
          ],
        },
      ],
    },
  };
}
