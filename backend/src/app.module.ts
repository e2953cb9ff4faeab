import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { EpsSizerServicesModule } from "./eps-sizer-services.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env", "../.env"],
      cache: true,
    }),
    EpsSizerServicesModule,
  ],
})
export class AppModule {
}
