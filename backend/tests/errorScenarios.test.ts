import { DataSource } from 'typeorm';
import { DiningTable } from '../src/entities/DiningTable';
import { OrderService } from '../src/services/OrderService';
import { clearDatabase, createTestDataSource, insertCategory, insertMenuItem } from './helpers/database';
import { TestServer, request, startTestServer } from './helpers/http';

describe('Error Scenarios', () => {
  let dataSource: DataSource;
  let server: TestServer;

  beforeAll(async () => {
    dataSource = await createTestDataSource();
    server = await startTestServer(dataSource);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await clearDatabase(dataSource);
  });

  afterAll(async () => {
    await server.close();
    await dataSource.destroy();
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(server, 'GET', '/nowhere');
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, error: 'NOT_FOUND', message: 'No route for GET /nowhere' });
  });

  it('should reject a malformed id', async () => {
    const response = await request(server, 'GET', '/orders/abc');
    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, error: 'VALIDATION_ERROR', message: 'Invalid id' });
  });

  it('should reject a malformed JSON body', async () => {
    const response = await fetch(`${server.baseUrl}/tables`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"number": 1,'
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Malformed JSON body'
    });
  });

  it('should not read a blank table number as zero', async () => {
    const response = await request(server, 'POST', '/tables', { number: '', capacity: '4' });
    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Please enter valid numbers for table number and capacity.'
    });
    expect(await dataSource.manager.count(DiningTable)).toBe(0);
  });

  it('should report a missing order', async () => {
    const response = await request(server, 'GET', '/orders/999999');
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, error: 'NOT_FOUND', message: 'Order 999999 not found' });
  });

  it('should report validation messages from the order form', async () => {
    const response = await request(server, 'POST', '/orders', { customer_name: 'Ann', table_id: 1, order_items: '[]' });
    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Please add at least one item to the order'
    });
  });

  it('should reject an invalid status filter', async () => {
    const response = await request(server, 'GET', '/orders?status=eaten');
    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ message: 'Invalid status!' });
  });

  it('should refuse to delete a category that has menu items', async () => {
    const category = await insertCategory(dataSource, 'Mains');
    await insertMenuItem(dataSource, category, 'Curry', 12);

    const response = await request(server, 'DELETE', `/categories/${category.id}`);

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      success: false,
      error: 'DELETION_BLOCKED',
      message: 'Cannot delete category "Mains". It still has 1 menu item(s).'
    });
  });

  it('should hide unexpected failures behind a generic 500', async () => {
    jest.spyOn(OrderService.prototype, 'listOrders').mockRejectedValueOnce(new Error('connection reset'));

    const response = await request(server, 'GET', '/orders');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ success: false, error: 'INTERNAL_ERROR', message: 'Internal server error' });
  });

  it('should echo the caller correlation id', async () => {
    const response = await fetch(`${server.baseUrl}/api/health`, {
      headers: { 'x-correlation-id': 'test-correlation' }
    });
    expect(response.headers.get('x-correlation-id')).toBe('test-correlation');
    expect(await response.json()).toMatchObject({
      status: 'healthy',
      database: { connected: true, type: 'better-sqlite3' },
      counts: { categories: 0, menu_items: 0, tables: 0, orders: 0, order_items: 0 }
    });
  });
});
