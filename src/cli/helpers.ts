import readline from "readline";
import { Group } from "../domain/group";
import { InstructorView, StudentView } from "../domain/examViews";

/**
 * Ask the user to choose from a menu of options. Resolves to a 1-based choice.
 */
export async function askMenu(
  rl: readline.Interface,
  options: string[]
): Promise<number> {
  return new Promise((resolve) => {
    console.log("What would you like to do?\n");
    options.forEach((opt, i) => {
      console.log(`  ${i + 1}. ${opt}`);
    });
    console.log("");

    const askChoice = () => {
      rl.question("> ", (answer: string) => {
        const choice = parseInt(answer, 10);
        if (choice >= 1 && choice <= options.length) {
          resolve(choice);
        } else {
          console.log(`Please enter a number between 1 and ${options.length}`);
          askChoice();
        }
      });
    };
    askChoice();
  });
}

/**
 * Free-text question; resolves to the trimmed answer (may be empty)
 */
export async function askText(rl: readline.Interface, question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(`${question}\n> `, (answer: string) => resolve(answer.trim()));
  });
}

/**
 * Parse an optional seed typed by the instructor. Empty means "random".
 */
export function parseSeedInput(input: string): number | undefined | null {
  if (input === "") return undefined;
  const seed = Number(input);
  return Number.isInteger(seed) && seed >= 0 ? seed : null;
}

export function formatGroup(group: Group): string {
  return `${group.name} (${group.members.map((m) => m.fullName).join(", ")})`;
}

/**
 * Lines for the instructor's printout
 */
export function formatInstructorView(view: InstructorView): string[] {
  if (view.kind === "pending") {
    return [`Session ${view.sessionId}: tasks not assigned yet.`];
  }

  const lines = [
    `Session ${view.sessionId} [${view.status}] seed ${view.seed ?? "-"}`,
    ...(view.group ? [`Group: ${formatGroup(view.group)}`] : []),
  ];

  for (const task of view.tasks) {
    const role = task.role === "dependency" ? " (prerequisite)" : "";
    lines.push("");
    lines.push(`${task.position}. [${task.categoryName}] ${task.title}${role}`);
    lines.push(`   ${task.prompt}`);
    if (task.hint) lines.push(`   Hint: ${task.hint}`);
    if (task.solution) lines.push(`   Solution: ${task.solution}`);
  }

  return lines;
}

/**
 * Lines for the screen the students see
 */
export function formatStudentView(view: StudentView): string[] {
  if (!view.ready) {
    return [`${view.statusLabel}. Checking again every ${view.pollIntervalMs / 1000}s.`];
  }

  const lines = [`${view.statusLabel}`];
  for (const task of view.tasks) {
    lines.push("");
    lines.push(`${task.position}. [${task.categoryName}] ${task.title}`);
    lines.push(`   ${task.prompt}`);
  }
  return lines;
}
