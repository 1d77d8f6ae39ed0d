import { DataSource } from 'typeorm';
import { createTestDataSource } from './helpers/database';
import { TestServer, numberAt, request, startTestServer } from './helpers/http';

describe('Order Flow Integration Tests', () => {
  let dataSource: DataSource;
  let server: TestServer;

  beforeAll(async () => {
    dataSource = await createTestDataSource();
    server = await startTestServer(dataSource);
  });

  afterAll(async () => {
    await server.close();
    await dataSource.destroy();
  });

  it('should take an order from an empty restaurant through to cancellation', async () => {
    const category = await request(server, 'POST', '/categories', { name: 'Starters' });
    expect(category.status).toBe(201);
    const categoryId = numberAt(category.body, 'category', 'id');

    const soup = await request(server, 'POST', '/menu', {
      name: 'Soup',
      description: 'Tomato soup',
      price: '5.00',
      category_id: categoryId
    });
    expect(soup.status).toBe(201);
    expect(soup.body).toMatchObject({ success: true, menu_item: { name: 'Soup', price: 5, category: 'Starters', available: true } });
    const soupId = numberAt(soup.body, 'menu_item', 'id');

    const table = await request(server, 'POST', '/tables', { number: 1, capacity: 4 });
    expect(table.status).toBe(201);
    expect(table.body).toMatchObject({ message: 'Table 1 added successfully!' });
    const tableId = numberAt(table.body, 'table', 'id');

    // The order form posts the item list as a JSON string
    const created = await request(server, 'POST', '/orders', {
      customer_name: 'Ann',
      table_id: String(tableId),
      order_items: JSON.stringify([{ id: soupId, quantity: 2 }])
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({
      success: true,
      message: 'Order created successfully!',
      order: {
        customer_name: 'Ann',
        status: 'pending',
        total_amount: 10,
        table_number: 1,
        items: [{ menu_item_id: soupId, name: 'Soup', quantity: 2, price: 5, line_total: 10 }]
      }
    });
    const orderId = numberAt(created.body, 'order_id');

    const occupied = await request(server, 'GET', `/tables/${tableId}`);
    expect(occupied.body).toMatchObject({ table: { is_occupied: true } });

    const rejected = await request(server, 'POST', '/orders', {
      customer_name: 'Ben',
      table_id: tableId,
      order_items: [{ id: soupId, quantity: 1 }]
    });
    expect(rejected.status).toBe(409);
    expect(rejected.body).toEqual({
      success: false,
      error: 'TABLE_UNAVAILABLE',
      message: 'Table 1 is already occupied'
    });

    const blocked = await request(server, 'DELETE', `/menu/${soupId}`);
    expect(blocked.status).toBe(409);
    expect(blocked.body).toMatchObject({ error: 'DELETION_BLOCKED' });

    const cancelled = await request(server, 'POST', `/orders/${orderId}/status`, { status: 'cancelled' });
    expect(cancelled.status).toBe(200);
    expect(cancelled.body).toMatchObject({ message: 'Order status updated to cancelled!', order: { status: 'cancelled' } });

    const freed = await request(server, 'GET', `/tables/${tableId}`);
    expect(freed.body).toMatchObject({ table: { is_occupied: false } });

    const deleted = await request(server, 'DELETE', `/menu/${soupId}`);
    expect(deleted.status).toBe(200);

    const history = await request(server, 'GET', `/orders/${orderId}`);
    expect(history.body).toMatchObject({
      order: { total_amount: 10, items: [{ menu_item_id: null, name: 'Soup', price: 5, quantity: 2 }] }
    });
  });

  it('should add items to a running order and report it on the dashboard', async () => {
    const category = await request(server, 'POST', '/categories', { name: 'Drinks' });
    const categoryId = numberAt(category.body, 'category', 'id');
    const tea = await request(server, 'POST', '/menu', {
      name: 'Tea',
      description: 'Black tea',
      price: 2.25,
      category_id: categoryId
    });
    const teaId = numberAt(tea.body, 'menu_item', 'id');
    const table = await request(server, 'POST', '/tables', { number: 2, capacity: 2 });
    const tableId = numberAt(table.body, 'table', 'id');

    const created = await request(server, 'POST', '/orders', {
      customer_name: 'Cy',
      table_id: tableId,
      order_items: [{ menu_item_id: teaId, quantity: 1 }]
    });
    const orderId = numberAt(created.body, 'order_id');

    const added = await request(server, 'POST', `/orders/${orderId}/items`, { menu_item_id: teaId, quantity: 2 });
    expect(added.status).toBe(200);
    expect(added.body).toMatchObject({
      order: { total_amount: 6.75, items: [{ quantity: 3, line_total: 6.75 }] }
    });

    const dashboard = await request(server, 'GET', '/api/dashboard');
    expect(dashboard.status).toBe(200);
    expect(dashboard.body).toMatchObject({
      total_orders: 2,
      pending_orders: 1,
      active_orders: 1,
      total_revenue: 6.75,
      occupied_tables: 1,
      available_tables: 1
    });

    const pending = await request(server, 'GET', '/orders?status=pending');
    expect(pending.body).toMatchObject({ count: 1, orders: [{ id: orderId }] });
  });

  it('should accept orders posted at the same time for different tables', async () => {
    const category = await request(server, 'POST', '/categories', { name: 'Sides' });
    const categoryId = numberAt(category.body, 'category', 'id');
    const rice = await request(server, 'POST', '/menu', {
      name: 'Rice',
      description: 'Steamed rice',
      price: 3,
      category_id: categoryId
    });
    const riceId = numberAt(rice.body, 'menu_item', 'id');
    const tableThree = numberAt((await request(server, 'POST', '/tables', { number: 3, capacity: 4 })).body, 'table', 'id');
    const tableFour = numberAt((await request(server, 'POST', '/tables', { number: 4, capacity: 4 })).body, 'table', 'id');

    const responses = await Promise.all(
      [tableThree, tableFour].map((tableId) =>
        request(server, 'POST', '/orders', {
          customer_name: 'Dee',
          table_id: tableId,
          order_items: [{ id: riceId, quantity: 1 }]
        })
      )
    );

    expect(responses.map((response) => response.status)).toEqual([201, 201]);
    expect(responses.map((response) => numberAt(response.body, 'order', 'total_amount'))).toEqual([3, 3]);
  });
});
