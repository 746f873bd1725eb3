import { toFailureEnvelope } from "../application/pull/pull.error-handler";
import { runPull } from "../composition/root";

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const executePullCli = async (): Promise<void> => {
  // Ctrl-C cancels the running pulls; finished work keeps its cursor
  let cancel: () => void = () => undefined;
  const handleSigint = () => cancel();
  process.once("SIGINT", handleSigint);

  try {
    const summary = await runPull({
      onStart: (runner) => {
        cancel = () => runner.cancel();
      }
    });
    if (summary.failed > 0) process.exitCode = 1;
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(toFailureEnvelope(err, isDebugMode())));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", handleSigint);
  }
};

if (require.main === module) {
  void executePullCli();
}
