import readline from "readline";
import { env } from "../src/config/env.js";
import { createSchedulingService } from "../src/app.js";
import { toZone } from "../src/services/calendar/clock.js";

const SESSION_ID = "console";

const MENU = `
==== Scheduling Assistant ====
1. Chat with the assistant
2. List appointments
3. Exit
`;

async function main() {
  const registry = createSchedulingService(env);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const ask = (prompt: string) =>
    new Promise<string>((resolve) => {
      rl.question(prompt, (answer) => resolve(answer.trim()));
    });

  async function chat() {
    console.log('Type your request, or "back" to return to the menu.');
    for (;;) {
      const text = await ask("You: ");
      if (!text) continue;
      if (text.toLowerCase() === "back") return;
      const turn = await registry.handleTurn(SESSION_ID, text);
      for (const entry of turn.transcript) {
        if (entry.speaker === "Assistant") console.log(`Assistant: ${entry.text}`);
      }
    }
  }

  function listAppointments() {
    const { appointments } = registry.snapshot(SESSION_ID);
    if (!appointments.length) {
      console.log("No appointments booked.");
      return;
    }
    for (const appointment of appointments) {
      const start = toZone(appointment.start, registry.rules.timeZone);
      const end = toZone(appointment.end, registry.rules.timeZone);
      console.log(`• ${appointment.title}: ${start.format("YYYY-MM-DD HH:mm")} - ${end.format("HH:mm")}`);
    }
  }

  for (;;) {
    console.log(MENU);
    const choice = await ask("Choose an option: ");
    if (choice === "1") await chat();
    else if (choice === "2") listAppointments();
    else if (choice === "3") break;
    else console.log("Please choose 1, 2 or 3.");
  }

  rl.close();
  console.log("Goodbye!");
}

main().catch((error) => {
  console.error("Chat session failed:", error);
  process.exit(1);
});
