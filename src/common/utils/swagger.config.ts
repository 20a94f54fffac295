import { DocumentBuilder, OpenAPIObject } from '@nestjs/swagger';

/** One tag per controller, matching their `@ApiTags`. */
export const API_TAGS = ['tracks', 'coverage', 'feeds', 'viewport'] as const;

export function buildSwaggerConfig(): Omit<OpenAPIObject, 'paths'> {
  const builder = new DocumentBuilder()
    .setTitle('Airspace Fusion API')
    .setDescription('Multi-source aircraft tracks, receiver coverage and map viewport')
    .setVersion('1.0');

  for (const tag of API_TAGS) {
    builder.addTag(tag);
  }
  return builder.build();
}
