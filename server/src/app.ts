import { envLoadedFrom, getSettings } from './config';
import express from 'express';
import cors from 'cors';
import tripPlannerRoutes from './routes/tripPlannerRoutes';
import userRoutes from './routes/userRoutes';
import tripRoutes from './routes/tripRoutes';
import tripMemberRoutes from './routes/tripMemberRoutes';
import activityRoutes from './routes/activityRoutes';
import expenseRoutes from './routes/expenseRoutes';
import messageRoutes from './routes/messageRoutes';

export { envLoadedFrom };

export const app = express();
app.use(cors({ origin: getSettings().corsOrigins, credentials: true }));
app.use(express.json());

app.get('/', (_req, res) => {
  res.json({ message: 'Trip Planner API' });
});

app.get('/health', (_req, res) => {
  res.json({ status: 'healthy' });
});

app.use('/api/trip-planner', tripPlannerRoutes);
app.use('/api/users', userRoutes);
app.use('/api/trips', tripRoutes);
app.use('/api/trips', tripMemberRoutes);
app.use('/api/trips', activityRoutes);
app.use('/api/trips', expenseRoutes);
app.use('/api/trips', messageRoutes);

export default app;
