import dotenv from "dotenv";
import { createApp } from "./app.js";
import { loadAppConfig, loadLogColumns } from "./config.js";

dotenv.config();

const config = loadAppConfig();
const app = createApp(config, { columns: loadLogColumns() });

app.listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port}`);
});
