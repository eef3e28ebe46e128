/**
 * API SERVER STARTUP SCRIPT
 *
 * Wires configuration, production effects and the order processing mediator
 * behind the HTTP API.
 *
 * Run this with: npm start
 */
import {Server} from 'node:http';
import {loadConfigFromEnv, makeAppEffects} from '../effects/EffectsFactory';
import {OrderProcessingMediator} from '../mediator/OrderProcessingMediator';
import {logger} from '../logger';
import {createApp} from './routes';
import {serverErrorHandler, shutdownHandler} from './lifecycle';

const log = logger.child({component: 'server'});

function main(): Server {
  const config = loadConfigFromEnv();
  const effects = makeAppEffects(config, logger);
  const mediator = new OrderProcessingMediator(effects, {
    defaultStrategy: config.reports.defaultStrategy,
    staffRecipients: config.email.staffRecipients,
    logger,
  });

  log.info('Configuration loaded', {
    outputPath: config.reports.outputPath,
    defaultStrategy: config.reports.defaultStrategy ?? null,
    smtpHost: config.email.host ?? null,
    strategies: mediator.getAvailableStrategies().map(strategy => strategy.name),
  });

  const app = createApp(mediator, config.reports, logger);
  return app.listen(config.server.port, () => {
    log.info('API server started', {
      port: config.server.port,
      routes: ['GET /health', 'GET /api/strategies', 'POST /api/orders/process'],
    });
  });
}

const server = main();

server.on('error', serverErrorHandler(log));
process.on('SIGINT', shutdownHandler(server, 'SIGINT', log));
process.on('SIGTERM', shutdownHandler(server, 'SIGTERM', log));
