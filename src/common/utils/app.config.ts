import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { AppConfig, configValidationSchema } from '../../config/config.schema';

const LOCALHOST_URL = /^http:\/\/(localhost|127\.0\.0\.1|::1)/;

export function parseConfig(raw: string): AppConfig {
  const parsed: unknown = yaml.load(raw);

  const { error, value } = configValidationSchema.validate(parsed, {
    abortEarly: false,
  });

  if (error) {
    throw new Error(`Config validation error:\n${error.message}`);
  }

  // Inside a container the feeds running on the host are not on localhost
  if (process.env.DOCKER) {
    value.sources = value.sources.map((source) => ({
      ...source,
      url: source.url.replace(LOCALHOST_URL, 'http://host.docker.internal'),
    }));
  }

  return value;
}

export default (): AppConfig => {
  const file = fs.readFileSync(process.env.CONFIG_PATH ?? './config.yaml', 'utf8');

  try {
    return parseConfig(file);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
};
