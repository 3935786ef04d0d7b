import { Module } from "@nestjs/common";

import { TrpcRouter } from "./trpc.router";
import { ImbalanceServicesModule } from "../imbalance-services.module";

@Module({
  imports: [ImbalanceServicesModule],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class TrpcModule {
}
