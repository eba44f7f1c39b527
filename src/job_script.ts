import { JobError } from "./errors.js";

export type JobScriptOptions = {
  metadataFile: string;
  archiveName: string;
};

export function preScript(opts: JobScriptOptions): string[] {
  return [`sed -i '/status:/s/:\\s*\\S*$/: queued/' "${opts.metadataFile}"`];
}

export function postScript(opts: JobScriptOptions): string[] {
  return [
    "# Update the metadata status",
    `sed -i '/status:/s/:\\s*\\S*$/: complete/' "${opts.metadataFile}"`,
    "",
    "# Pack (almost) all the contents into a zip without compression",
    `find . -maxdepth 1 -type f \\( -name "OUTCAR" -o -size -100M \\) -printf "%P\\n" | xargs zip -q -0 -u ${opts.archiveName}.zip`,
  ];
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Inserts the status/cleanup hooks around the body of a SLURM script:
 * directives, pre-script, body, post-script, each separated by a blank line.
 */
export function modifyJobScript(text: string, opts: JobScriptOptions): string {
  const lines = splitLines(text);
  let lastDirective = -1;
  lines.forEach((line, i) => {
    if (line.includes("#SBATCH")) lastDirective = i;
  });
  if (lastDirective < 0) throw new JobError("Job script has no #SBATCH directives");
  const head = lines.slice(0, lastDirective + 1);
  const body = lines.slice(lastDirective + 1);
  return [...head, "", ...preScript(opts), "", ...body, "", ...postScript(opts)].join("\n") + "\n";
}
