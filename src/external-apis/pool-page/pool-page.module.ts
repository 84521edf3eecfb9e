import { Module } from "@nestjs/common";
import { PoolPageClient } from "./pool-page.client";

@Module({
  providers: [PoolPageClient],
  exports: [PoolPageClient],
})
export class PoolPageModule {}
