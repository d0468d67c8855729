import { cancel, isCancel } from "@clack/prompts";

function unwrapPrompt<T>(value: T | symbol, message = "Operation canceled."): T {
  if (isCancel(value)) {
    cancel(message);
    process.exit(1);
  }

  return value;
}

export { unwrapPrompt };
