import dotenv from "dotenv";

dotenv.config();

export const config = {
  geoDataPath: process.env.GEODATA_PATH || "data/regions.geo",
  dbPath: process.env.DB_PATH || "data/regions.db",
  port: Number(process.env.PORT ?? 3000),
};
