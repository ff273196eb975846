import { AnalysisClient } from './analysis/client';
import { geminiFileServiceFactory } from './analysis/fileService';
import { createApp } from './app';
import { loadConfig, loadEnvFile } from './config';
import { FlowService } from './flow/service';
import { SessionRegistry } from './flow/sessions';
import { SmtpNotifier } from './notify/mailer';
import { OrderStore } from './orders/store';
import { SimulatedPaymentGateway } from './payment/gateway';

loadEnvFile();
const config = loadConfig();

const orders = new OrderStore(config.databasePath);
const notifier = new SmtpNotifier(config.smtp);

const analysis = new AnalysisClient(geminiFileServiceFactory(config.gemini.model), config.analysis);

const flow = new FlowService({
  sessions: new SessionRegistry({ idleTtlMs: config.sessionIdleTtlMs }),
  analysis,
  orders,
  notifier,
  payments: new SimulatedPaymentGateway(config.payment.delayMs),
  pricing: config.pricing,
  defaultApiKey: config.gemini.apiKey,
});

const app = createApp({
  flow,
  orders,
  adminPassword: config.adminPassword,
  uploadMaxBytes: config.uploadMaxBytes,
  aiConfigured: Boolean(config.gemini.apiKey),
  emailConfigured: notifier.configured,
});

const server = app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
  console.log(`Gemini key configured: ${config.gemini.apiKey ? 'Yes' : 'No (users must supply one)'}`);
  console.log(`Email configured: ${notifier.configured ? 'Yes' : 'No'}`);
  console.log(`Orders database: ${config.databasePath}`);
});

process.on('SIGTERM', () => {
  server.close(() => orders.close());
});
