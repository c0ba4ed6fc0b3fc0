/**
 * Ask a single question from the command line.
 *
 * Loads the corpus and config the same way the server does, embeds the
 * corpus, and prints the answer.
 *
 * Usage:
 *   npx tsx server/scripts/ask.ts "When is Layla planning her trip to London?" [--person "Layla"] [--trace]
 *
 * Options:
 *   --person NAME   Restrict to messages from NAME
 *   --trace         Print the pipeline outcome (stage timings, candidate count) instead of just the answer
 */

import { loadConfig } from "../config/appConfig";
import { loadCorpus } from "../corpus/messageCorpus";
import { createPipeline, warmPipeline } from "../pipeline/createPipeline";

type CliArgs = {
  question: string;
  person?: string;
  trace: boolean;
};

function parseArgs(argv: string[]): CliArgs {
  const words: string[] = [];
  let person: string | undefined;
  let trace = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--trace") {
      trace = true;
    } else if (arg === "--person") {
      person = argv[++i];
    } else if (arg !== undefined) {
      words.push(arg);
    }
  }
  return { question: words.join(" "), person, trace };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.question) {
    console.log('Usage: npx tsx server/scripts/ask.ts "<question>" [--person NAME] [--trace]');
    process.exitCode = 1;
    return;
  }

  const config = loadConfig(process.env);
  const corpus = await loadCorpus(config.corpus);
  const pipeline = createPipeline(config, corpus);
  await warmPipeline(pipeline, corpus);

  if (args.trace) {
    const outcome = await pipeline.orchestrator.run(args.question, { targetPerson: args.person });
    console.log(JSON.stringify(outcome, null, 2));
    return;
  }

  const answer = await pipeline.orchestrator.ask(args.question, { targetPerson: args.person });
  console.log(answer.text);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
