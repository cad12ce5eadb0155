import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";

export async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(new Logger());
  app.enableShutdownHooks();
  const port = process.env.CRASH_API_PORT ? Number(process.env.CRASH_API_PORT) : process.env.PORT ? Number(process.env.PORT) : 3003;
  await app.listen(port);
  Logger.log(`Crash API is running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  Logger.error("Failed to start", error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
