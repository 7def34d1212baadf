import helmet from "helmet";
import { RequestMethod } from "@nestjs/common";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import type { SwaggerDocumentOptions } from "@nestjs/swagger";
import { API_KEY_HEADER } from "@/guards/api-key.guard";
import type { AppConfigService } from "@/config/config.service";

/**
 * HTTP-level setup shared by bootstrap and the end-to-end specs
 */
export function configureApp(app: NestExpressApplication, config: AppConfigService): void {
  const { apiPrefix, corsOrigins, corsMaxAge, bodyLimitBytes, debug } = config.application;

  // Replaces the framework's default 100 kB JSON parser
  app.useBodyParser("json", { limit: bodyLimitBytes });

  // GET / stays at the root, everything else lives under the prefix
  app.setGlobalPrefix(apiPrefix, { exclude: [{ path: "/", method: RequestMethod.GET }] });

  app.use(
    helmet({
      // Swagger UI needs inline styles and scripts
      contentSecurityPolicy: debug ? false : undefined,
      crossOriginEmbedderPolicy: false,
    })
  );

  app.enableCors({
    origin: corsOrigins.length > 0 ? corsOrigins : false,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-API-Key", "X-Request-ID"],
    exposedHeaders: ["X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset", "Retry-After", "X-Request-ID"],
    credentials: false,
    maxAge: corsMaxAge,
  });

  if (debug) {
    setupSwaggerDocumentation(app, config);
  }
}

function setupSwaggerDocumentation(app: NestExpressApplication, config: AppConfigService): void {
  const { apiPrefix, serviceName, version } = config.application;

  const document = new DocumentBuilder()
    .setTitle("Telemetry Proxy API")
    .setDescription(
      "Authenticated, rate-limited proxy in front of an IoT telemetry platform. " +
        "Every error is returned in one normalized shape."
    )
    .setVersion(version)
    .addApiKey({ type: "apiKey", in: "header", name: API_KEY_HEADER }, API_KEY_HEADER)
    .addTag("Telemetry", "Single-device and bulk telemetry uploads")
    .addTag("System Health", "Liveness and service information")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  SwaggerModule.setup(`${apiPrefix}/docs`, app, SwaggerModule.createDocument(app, document, options), {
    customSiteTitle: `${serviceName} API`,
  });
}
