import 'dotenv/config';
import express from 'express';
import { pool } from './db';
import { requireAuth } from './middleware/auth.middleware';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createBatchAllocationRouter } from './routes/batchAllocation.routes';
import healthRouter from './routes/health.routes';
import { pgAllocationDataSource } from './services/allocationDataSource';

const PORT = Number(process.env.PORT) || 3000;

const app = express();
app.use(express.json({ limit: '1mb' }));
app.use(requestContextMiddleware);
app.use(requestLoggerMiddleware);

app.use(healthRouter);
app.use(requireAuth, createBatchAllocationRouter(pgAllocationDataSource));

app.use((_req, res) => {
  res.status(404).json({ error: 'Not found' });
});

pool.on('error', (err) => {
  console.error('Unexpected DB pool error', err);
});

app.listen(PORT, () => {
  console.log(`Relief allocation API listening on port ${PORT}`);
});
