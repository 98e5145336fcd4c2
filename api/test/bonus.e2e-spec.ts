import { Test } from '@nestjs/testing';
import type { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../src/app/app.module';
import { configureApp } from '../src/app/configure-app';
import { DATA_STORE } from '../src/core/database/database.types';
import { PgService } from '../src/core/database/pg.service';
import { InMemoryDataStore } from './support/in-memory-data-store';

const ADMIN = { 'x-admin-key': 'test-admin-key' };
const API = { 'x-api-key': 'test-key' };

describe('Bonus ledger (e2e)', () => {
  let app: INestApplication;
  let store: InMemoryDataStore;

  const pgStub = {
    query: jest.fn(async () => ({ rows: [], rowCount: 0 })),
    onModuleDestroy: jest.fn(async () => undefined),
  };

  beforeAll(async () => {
    store = new InMemoryDataStore();
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(PgService)
      .useValue(pgStub)
      .overrideProvider(DATA_STORE)
      .useValue(store)
      .compile();
    app = moduleRef.createNestApplication();
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('rejects sales writes without an API key', async () => {
    await request(app.getHttpServer())
      .post('/sales/transactions')
      .send({ transactionId: '1', sum: '10.00' })
      .expect(401);
  });

  it('rejects operator calls without the admin key', async () => {
    await request(app.getHttpServer())
      .post('/admin/bonus/triggers')
      .send({ enable: true })
      .expect(401);
  });

  it('posts a closed sale and shows the balance to the bot', async () => {
    const server = app.getHttpServer();

    await request(server)
      .post('/admin/bonus/triggers')
      .set(ADMIN)
      .send({ enable: true })
      .expect(200)
      .expect({ message: 'Bonus triggers ENABLED successfully' });

    await request(server)
      .post('/sales/clients')
      .set(API)
      .send({ clientId: '7', firstname: 'Olena' })
      .expect(201);

    const created = await request(server)
      .post('/sales/transactions')
      .set(API)
      .send({
        transactionId: '1001',
        clientId: '7',
        dateClose: '2025-09-02 10:00:00',
        sum: '100.00',
        payedBonus: '10.00',
        bonusPercent: '5',
        items: [{ sum: '100.00' }],
      })
      .expect(201);
    expect(created.body.transaction.discount).toBe('90.00');

    const bonus = await request(server)
      .get('/clients/7/bonus')
      .set(API)
      .expect(200);
    expect(bonus.body.balance).toBe(-500);
    expect(
      bonus.body.entries.map((entry: { operationType: string }) => entry.operationType),
    ).toEqual(['EARN', 'SPEND']);
  });

  it('rebuilds the ledger on request', async () => {
    const res = await request(app.getHttpServer())
      .post('/admin/bonus/recalculate')
      .set(ADMIN)
      .send({})
      .expect(200);

    expect(res.body).toEqual({
      totalTransactions: 1,
      updatedTransactions: 1,
      totalEarned: 500,
      totalSpent: 1000,
    });
  });

  it('maps a missing client to 404', async () => {
    const res = await request(app.getHttpServer())
      .get('/clients/404/bonus')
      .set(API)
      .expect(404);
    expect(res.body.statusCode).toBe(404);
  });

  it('maps a duplicate sale to 409', async () => {
    await request(app.getHttpServer())
      .post('/sales/transactions')
      .set(API)
      .send({ transactionId: '1001', sum: '1.00' })
      .expect(409);
  });

  it('validates money fields', async () => {
    await request(app.getHttpServer())
      .post('/sales/transactions')
      .set(API)
      .send({ transactionId: '2001', sum: 'lots' })
      .expect(400);
  });

  it('calculates a discount without writing it', async () => {
    const res = await request(app.getHttpServer())
      .get('/admin/discounts/1001')
      .set(ADMIN)
      .expect(200);
    expect(res.body).toMatchObject({
      transactionId: '1001',
      itemCount: 1,
      lineTotal: '100.00',
      discount: '90.00',
    });
  });

  it('recomputes a batch and skips sales without line items', async () => {
    const server = app.getHttpServer();
    const res = await request(server)
      .post('/admin/discounts/recalculate-batch')
      .set(ADMIN)
      .send({ transactionIds: ['1001', '404'] })
      .expect(200);
    expect(res.body).toEqual([
      {
        transactionId: '1001',
        oldDiscount: '90.00',
        newDiscount: '90.00',
        updated: true,
        changed: false,
      },
    ]);

    await request(server)
      .post('/admin/discounts/recalculate-batch')
      .set(ADMIN)
      .send({ transactionIds: [] })
      .expect(400);
  });

  it('stores and reads system settings', async () => {
    const server = app.getHttpServer();
    const saved = await request(server)
      .put('/admin/settings/default_bonus_percent')
      .set(ADMIN)
      .send({ value: '7.5' })
      .expect(200);
    expect(saved.body).toMatchObject({ key: 'default_bonus_percent', value: '7.5' });

    await request(server).get('/admin/settings/no_such_key').set(ADMIN).expect(404);
  });

  it('exports the open failure backlog with the metrics', async () => {
    const res = await request(app.getHttpServer()).get('/metrics').expect(200);
    const lines = res.text.split('\n');
    expect(lines).toContain('engine_failures_open{engine="bonus"} 0');
    expect(lines).toContain('engine_failures_open{engine="discount"} 0');
  });
});
