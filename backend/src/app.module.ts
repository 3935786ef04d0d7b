import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { ImbalanceServicesModule } from "./imbalance-services.module";
import { StorageModule } from "./storage/storage.module";
import { TrpcModule } from "./trpc/trpc.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env", "../.env"],
      cache: true,
    }),
    StorageModule,
    ImbalanceServicesModule,
    TrpcModule,
  ],
})
export class AppModule {
}
