import { createServer } from "http";
import { createApp } from "./api.js";
import { config } from "./config.js";
import { openDatabase } from "./db.js";
import { GeoDataStore } from "./geoDataStore.js";

const db = openDatabase(config.dbPath);
const store = new GeoDataStore(config.geoDataPath);

// A missing or invalid file leaves the store serving an empty set until the next reload/build.
if (store.reload()) {
  console.warn(`[geodata] serving empty set; POST /geodata/build or /geodata/reload once ${config.geoDataPath} is ready`);
}

const app = createApp(store, db);
const server = createServer(app);

server.listen(config.port, () => console.log(`Server listening on :${config.port}`));

process.on("SIGTERM", () => {
  server.close(() => {
    store.close();
    db.close();
  });
});
