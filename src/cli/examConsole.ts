import readline from "readline";
import { Group } from "../domain/group";
import { isExamError } from "../domain/errors";
import { GroupStore } from "../stores/groupStore";
import { ExamSessionService, createExamSessionService } from "../services/examSessionService";
import {
  askMenu,
  askText,
  formatGroup,
  formatInstructorView,
  formatStudentView,
  parseSeedInput,
} from "./helpers";

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

/**
 * Pick a group from the roster. Returns null when the roster is empty.
 */
async function chooseGroup(groups: Group[]): Promise<Group | null> {
  if (groups.length === 0) {
    console.log("\nNo groups yet. Import the roster first.\n");
    return null;
  }
  const choice = await askMenu(rl, groups.map(formatGroup));
  return groups[choice - 1];
}

async function drawTasks(service: ExamSessionService, sessionId: string): Promise<void> {
  const seedInput = await askText(rl, "Seed for a reproducible draw (enter for random):");
  const seed = parseSeedInput(seedInput);
  if (seed === null) {
    console.log("\nSeed must be a non-negative whole number.\n");
    return;
  }

  const outcome = await service.computeAssignment(sessionId, seed);
  if (outcome.alreadyAssigned) {
    console.log("\nTasks were already assigned; showing the existing draw.\n");
  }
  printLines(formatInstructorView(await service.getInstructorView(sessionId)));
}

function printLines(lines: string[]): void {
  console.log("\n" + lines.join("\n") + "\n");
}

/**
 * Instructor console: run an oral exam for one group from the terminal
 */
async function runExamConsole(): Promise<void> {
  const service = createExamSessionService();
  const groupStore = new GroupStore();

  console.log("\n" + "=".repeat(60));
  console.log("Oral Exam Console");
  console.log("=".repeat(60) + "\n");

  const group = await chooseGroup(groupStore.getAll());
  if (!group) return;

  const session = await service.createSession(group.id);
  console.log(`\nCreated session ${session.id} for ${group.name}.\n`);

  let running = true;
  while (running) {
    const choice = await askMenu(rl, [
      "Draw tasks",
      "Show instructor view",
      "Show student view",
      "Complete exam",
      "Exit",
    ]);

    try {
      switch (choice) {
        case 1:
          await drawTasks(service, session.id);
          break;
        case 2:
          printLines(formatInstructorView(await service.getInstructorView(session.id)));
          break;
        case 3:
          printLines(formatStudentView(await service.getStudentView(session.id)));
          break;
        case 4:
          await service.completeSession(session.id);
          console.log("\nExam completed.\n");
          running = false;
          break;
        case 5:
          running = false;
          break;
      }
    } catch (error) {
      if (!isExamError(error)) throw error;
      console.log(`\n${error.message}\n`);
    }
  }
}

async function main() {
  try {
    await runExamConsole();
  } catch (error) {
    console.error("Exam console failed:", error);
    process.exitCode = 1;
  } finally {
    rl.close();
  }
}

void main();
