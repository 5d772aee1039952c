/**
 * CLI help text for --help output.
 */

export function getHelp(): string {
  return `
SYNOPSIS
  docstring-auditor [path] [flags]

DESCRIPTION
  Audit the docstrings of every Python function in a file or directory.
  Each function is sent to a language model, which reports errors (the
  docstring disagrees with the code or is missing) and warnings (style,
  typos). With --auto-fix, suggested docstrings for functions with errors
  are written back into the source file.

  path defaults to the current directory.

FLAGS
  --ignore-dirs=DIR[,DIR]    Directory names to skip while walking (default: tests)
  --model=NAME               Model to use (default: gpt-4; claude-* uses Anthropic)
  --code-block-name=NAME     Audit only the function with this exact name
  --auto-fix                 Write suggested docstrings for functions with errors
  --error-on-warnings        Exit non-zero when warnings are found
  --include-classes          Audit class docstrings as well
  --docstring-style=STYLE    Expected docstring convention (default: numpydoc)
  --config=FILE              Config file (default: .docstring-auditor.yml)
  --help                     Show this help

ENVIRONMENT
  OPENAI_API_KEY             Key for OpenAI models
  OPENAI_BASE_URL            OpenAI-compatible endpoint (default: https://api.openai.com/v1)
  ANTHROPIC_API_KEY          Key for claude-* models
  LOG_LEVEL                  Log level for stderr diagnostics (default: info)
  NO_COLOR                   Disable colored output

EXIT STATUS
  0  No errors (and no warnings with --error-on-warnings)
  1  Errors, warnings with --error-on-warnings, or functions that could not be audited
  2  Unparsable files, unreachable completion service, or invalid usage

EXAMPLES
  docstring-auditor src/
  docstring-auditor app.py --code-block-name=compute --auto-fix
  docstring-auditor . --ignore-dirs=tests,migrations --error-on-warnings
`.trim();
}
