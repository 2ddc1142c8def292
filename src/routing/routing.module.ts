import { Module } from "@nestjs/common";
import { RouterClient, routerHttpProvider } from "./router.client";

@Module({
  providers: [routerHttpProvider, RouterClient],
  exports: [RouterClient],
})
export class RoutingModule {}
