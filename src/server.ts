/**
 * HTTP server entry point
 */
import { loadConfig } from './config';
import { createApp } from './app';
import { BookGenerator } from './generator';
import { LLMProviderManager, createDefaultFactories } from './llm/provider';
import { getLogger } from './logger';

const logger = getLogger('server');

const config = loadConfig();

const generator = new BookGenerator({
  providers: new LLMProviderManager(createDefaultFactories(config.models)),
});

const envKeys = Object.keys(config.credentials);
if (envKeys.length > 0) {
  generator.configure(config.credentials);
  logger.info(`Auto-configured APIs from environment: ${envKeys.join(', ')}`);
}

const app = createApp(generator);

app.listen(config.port, () => {
  logger.info(`Bookwright server running on http://localhost:${config.port}`);
  const available = generator.getAvailableProviders();
  logger.info(`Available providers: ${available.length > 0 ? available.join(', ') : 'none (POST /configure-apis to add keys)'}`);
});
