import { createLegalReviewHandler } from "./apps/legalReview/handler";
import { APP_NAME, createLegalReviewRouter } from "./http/createLegalReviewRouter";
import { ConfigurationError, loadConfig, type AppConfig } from "./lib/config";
import { createSpineLogger } from "./lib/logging";
import { createApp } from "./server";

const logger = createSpineLogger({ app: APP_NAME, domain: "startup" });

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigurationError) {
    logger.log("error", "configuration_invalid", { error: err.message });
    process.exit(1);
  }
  throw err;
}

const app = createApp();
app.use(
  createLegalReviewRouter({
    handler: createLegalReviewHandler(config),
    config,
  }),
);

app.listen(config.port, () => {
  logger.log("info", "server_listening", {
    url: `http://localhost:${config.port}`,
    jira_project_key: config.jira.projectKey,
    description_layout: config.jira.descriptionLayout,
  });
});
