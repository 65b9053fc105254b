import { checkConnection, pool, withConnection, withTransaction } from '@checkout-stock/shared/src/db/client';
import { PoolClient } from 'pg';
import { createMockClient } from '../helpers/mockClient';

describe('Database client (Unit)', () => {
     let mockClient: jest.Mocked<PoolClient>;

     beforeEach(() => {
          mockClient = createMockClient();
          mockClient.query.mockResolvedValue({ rows: [] } as never);
          jest.spyOn(pool, 'connect').mockImplementation((() => Promise.resolve(mockClient)) as never);
     });

     afterEach(() => {
          jest.restoreAllMocks();
     });

     afterAll(async () => {
          await pool.end();
     });

     describe('withTransaction', () => {
          it('should commit and release on success', async () => {
               const result = await withTransaction(async (client) => {
                    await client.query('SELECT 1');
                    return 'done';
               });

               expect(result).toBe('done');
               expect(mockClient.query.mock.calls.map((call) => call[0])).toEqual([
                    'BEGIN',
                    'SELECT 1',
                    'COMMIT',
               ]);
               expect(mockClient.release).toHaveBeenCalledTimes(1);
          });

          it('should roll back, release and rethrow on failure', async () => {
               const failure = new Error('boom');

               await expect(
                    withTransaction(async () => {
                         throw failure;
                    })
               ).rejects.toBe(failure);

               expect(mockClient.query.mock.calls.map((call) => call[0])).toEqual([
                    'BEGIN',
                    'ROLLBACK',
               ]);
               expect(mockClient.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withConnection', () => {
          it('should run without a transaction and release', async () => {
               await withConnection((client) => client.query('SELECT 1'));

               expect(mockClient.query).toHaveBeenCalledTimes(1);
               expect(mockClient.query).toHaveBeenCalledWith('SELECT 1');
               expect(mockClient.release).toHaveBeenCalledTimes(1);
          });

          it('should release when the callback fails', async () => {
               await expect(
                    withConnection(async () => {
                         throw new Error('boom');
                    })
               ).rejects.toThrow('boom');
               expect(mockClient.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('checkConnection', () => {
          it('should report a reachable database', async () => {
               await expect(checkConnection()).resolves.toBe(true);
          });

          it('should report an unreachable database', async () => {
               jest.spyOn(pool, 'connect').mockImplementation(
                    (() => Promise.reject(new Error('ECONNREFUSED'))) as never
               );

               await expect(checkConnection()).resolves.toBe(false);
          });
     });
});
