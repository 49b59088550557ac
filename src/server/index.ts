import { loadConfig } from "../core/config.js";
import { OpenRouterClassifier } from "../core/llm-classify.js";
import { createApp } from "./app.js";

const config = loadConfig();
const app = createApp({ config, classifier: new OpenRouterClassifier(config) });

app.listen(config.port, () => {
  console.log(`\nImage sorter running at http://localhost:${config.port}\n`);
  console.log(`  Intake: ${config.intakeDir}`);
  console.log(`  Output: ${config.outputDir}\n`);
});
