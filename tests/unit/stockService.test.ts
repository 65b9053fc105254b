import { StockService } from '@checkout-stock/shared/src/services/stock-service';
import { StockNotFoundError } from '@checkout-stock/shared/src/utils/errors';
import { PoolClient } from 'pg';
import { createMockClient } from '../helpers/mockClient';

describe('StockService (Unit)', () => {
     let stockService: StockService;
     let mockClient: jest.Mocked<PoolClient>;

     beforeEach(() => {
          stockService = new StockService();
          mockClient = createMockClient();
     });

     describe('getQuantity', () => {
          it('should return the stock quantity', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [{ id: '5', warehouse_id: '1', product_variant_id: '9', quantity: 7 }],
               } as never);

               await expect(stockService.getQuantity(mockClient, 5)).resolves.toBe(7);
               expect(mockClient.query).toHaveBeenCalledWith(
                    expect.stringContaining('WHERE id = $1'),
                    [5]
               );
          });

          it('should throw for an unknown stock', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               await expect(stockService.getQuantity(mockClient, 404)).rejects.toThrow(
                    StockNotFoundError
               );
          });

          it('should read without locking', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [{ id: 5, warehouse_id: 1, product_variant_id: 9, quantity: 7 }],
               } as never);

               await stockService.getQuantity(mockClient, 5);

               expect(mockClient.query).toHaveBeenCalledWith(
                    expect.not.stringContaining('FOR UPDATE'),
                    [5]
               );
          });
     });

     describe('lockStocks', () => {
          it('should lock distinct stocks in ascending id order', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [
                         { id: '1', warehouse_id: '1', product_variant_id: '9', quantity: '4' },
                         { id: '3', warehouse_id: '2', product_variant_id: '9', quantity: '6' },
                    ],
               } as never);

               const stocks = await stockService.lockStocks(mockClient, [3, 1, 3]);

               expect(stocks).toEqual([
                    { id: 1, warehouseId: 1, variantId: 9, quantity: 4 },
                    { id: 3, warehouseId: 2, variantId: 9, quantity: 6 },
               ]);
               expect(mockClient.query).toHaveBeenCalledWith(
                    expect.stringMatching(/ORDER BY id\s+FOR UPDATE/),
                    [[1, 3]]
               );
          });

          it('should throw when a stock is missing', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [{ id: 1, warehouse_id: 1, product_variant_id: 9, quantity: 4 }],
               } as never);

               await expect(stockService.lockStocks(mockClient, [1, 2])).rejects.toMatchObject({
                    code: 'STOCK_NOT_FOUND',
                    stockId: 2,
               });
          });

          it('should not query for an empty list', async () => {
               await expect(stockService.lockStocks(mockClient, [])).resolves.toEqual([]);
               expect(mockClient.query).not.toHaveBeenCalled();
          });
     });

     describe('getEligibleStocks', () => {
          it('should filter by channel shipping zones covering the country', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [{ id: '1', warehouse_id: '2', product_variant_id: '10', quantity: 2 }],
               } as never);

               const stocks = await stockService.getEligibleStocks(mockClient, {
                    channelId: 4,
                    countryCode: 'US',
                    variantIds: [10, 10],
               });

               expect(stocks).toEqual([{ id: 1, warehouseId: 2, variantId: 10, quantity: 2 }]);
               const [sql, params] = mockClient.query.mock.calls[0];
               expect(sql).toContain('szc.channel_id = $2');
               expect(sql).toContain('$3 = ANY(sz.countries)');
               expect(sql).not.toContain('FOR UPDATE');
               expect(params).toEqual([[10], 4, 'US']);
          });

          it('should return nothing for no variants', async () => {
               await expect(
                    stockService.getEligibleStocks(mockClient, {
                         channelId: 4,
                         countryCode: 'US',
                         variantIds: [],
                    })
               ).resolves.toEqual([]);
               expect(mockClient.query).not.toHaveBeenCalled();
          });
     });
});
