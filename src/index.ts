import 'dotenv/config';
import { loadConfig } from './config.js';
import { createApp } from './server.js';
import { createGoogleSpreadsheetApi, GoogleSheetsSink } from './sheets-client.js';
import { createTableSources } from './table-sources.js';

const config = loadConfig();

const app = createApp(config, {
  sources: createTableSources(config),
  sink: new GoogleSheetsSink(createGoogleSpreadsheetApi(config.credentialsFile), config.spreadsheetId, config.sheetTitle),
});

app.listen(config.port, () => {
  console.log(`[Server] Listening on http://localhost:${config.port}`);
});
