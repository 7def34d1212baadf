import { Global, Module } from "@nestjs/common";
import { AppConfigService } from "./config.service";
import { ENV } from "./environment.constants";

@Global()
@Module({
  providers: [
    {
      provide: AppConfigService,
      useFactory: () => new AppConfigService(ENV),
    },
  ],
  exports: [AppConfigService],
})
export class ConfigModule {}
