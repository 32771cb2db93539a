/** Evaluation environment for `on` / `to` selectors. */
export type SelectorContext = {
  /** Architecture the build runs on, matched by `on`. */
  readonly buildArch: string;
  /** Architecture the artifact runs on, matched by `to`. */
  readonly targetArch: string;
  /** Values substituted for `$NAME` references in resolved grammar values. */
  readonly environment: Readonly<Record<string, string>>;
};
