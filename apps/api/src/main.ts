import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Listening on :${port}`, "bootstrap");
}

bootstrap().catch(err => {
  Logger.error(err instanceof Error ? err.stack : String(err), "bootstrap");
  process.exit(1);
});
