export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
}

export const getDatabaseConfig = (): DatabaseConfig => {
  const nodeEnv = process.env.NODE_ENV;
  const dbName = process.env.DB_DATABASE || "pool_occupancy";

  // Tests must never point at a dev/prod database
  if (nodeEnv === "test" && !dbName.includes("test")) {
    throw new Error(
      `NODE_ENV=test but DB_DATABASE="${dbName}" does not contain "test". ` +
        `Set DB_DATABASE=pool_occupancy_test in .env.test`,
    );
  }

  return {
    host: process.env.DB_HOST || "localhost",
    port: parseInt(process.env.DB_PORT || "5432", 10),
    username: process.env.DB_USERNAME || "pool",
    password: process.env.DB_PASSWORD || "pool_dev_password",
    database: dbName,
    synchronize: process.env.DB_SYNCHRONIZE === "true",
    logging: process.env.DB_LOGGING === "true",
  };
};
