import { env } from "./config/env.js";
import { createApp, createSchedulingService } from "./app.js";
import { formatTimeOfDay } from "./config/businessRules.js";

const registry = createSchedulingService(env);
const app = createApp(registry);

app.listen(env.PORT, () => {
  const { rules } = registry;
  console.log(`Server listening on port ${env.PORT}`);
  console.log(
    `📅 ${rules.timeZone}, ${formatTimeOfDay(rules.open)}-${formatTimeOfDay(rules.close)}, ` +
      `lunch ${formatTimeOfDay(rules.lunch.start)}-${formatTimeOfDay(rules.lunch.end)}`
  );
});
