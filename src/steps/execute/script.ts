/** Helper script the internal executor installs on guests. */
export interface Script {
  // Install destination on the guest
  readonly path: string;
  // Additional names linking to the same script
  readonly aliases: readonly string[];
  // Environment variables the script reacts to
  readonly relatedVariables: readonly string[];
}

export function defineScript(path: string, aliases: string[] = [], relatedVariables: string[] = []): Script {
  return Object.freeze({
    path,
    aliases: Object.freeze([...aliases]),
    relatedVariables: Object.freeze([...relatedVariables]),
  });
}

export const SCRIPTS_DEST_DIR = '/usr/local/bin';

export const REPORT_RESULT_SCRIPT = defineScript(
  `${SCRIPTS_DEST_DIR}/guestrun-report-result`,
  [`${SCRIPTS_DEST_DIR}/rstrnt-report-result`, `${SCRIPTS_DEST_DIR}/rhts-report-result`],
  ['GUESTRUN_REPORT_RESULT_FILE']
);

export const FILE_SUBMIT_SCRIPT = defineScript(
  `${SCRIPTS_DEST_DIR}/guestrun-file-submit`,
  [`${SCRIPTS_DEST_DIR}/rstrnt-report-log`, `${SCRIPTS_DEST_DIR}/rhts-submit-log`],
  ['GUESTRUN_TEST_DATA']
);
