import { TypeOrmModuleAsyncOptions } from "@nestjs/typeorm";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { getDatabaseConfig } from "./database.config";
import { OccupancySample } from "../samples/entities/occupancy-sample.entity";
import { CreateOccupancySamples1729000000000 } from "../database/migrations/1729000000000-CreateOccupancySamples";

export const typeOrmConfig: TypeOrmModuleAsyncOptions = {
  imports: [ConfigModule],
  inject: [ConfigService],
  useFactory: () => {
    const dbConfig = getDatabaseConfig();

    return {
      type: "postgres" as const,
      host: dbConfig.host,
      port: dbConfig.port,
      username: dbConfig.username,
      password: dbConfig.password,
      database: dbConfig.database,
      entities: [OccupancySample],
      migrations: [CreateOccupancySamples1729000000000],
      migrationsRun: true,
      synchronize: dbConfig.synchronize, // dev only
      logging: dbConfig.logging,
      extra: {
        max: 5, // single writer + a handful of readers
        connectionTimeoutMillis: 2000,
      },
    };
  },
};
