/**
 * Template literals for the files written by `canon-check init`.
 */
import { DEFAULT_IGNORE_PATTERNS } from '../../utils/canonignore.js';

export const CONFIG_TEMPLATE = `# canon-check configuration
#
# Commands:
#   canon-check check            - run every check
#   canon-check check --pre-commit
#   canon-check tools            - show which external linters are installed

version: "1.0"

# Documentation locations, relative to the project root
paths:
  docs: docs
  rest_source: docs/source
  sphinx_build: docs/build
  decisions: docs/decisions
  changelog: CHANGELOG.md
  openapi: api-specs
  graphql: graphql
  proto: proto

# External linters. Override the executable or prepend arguments:
#   rstcheck:
#     command: /opt/venv/bin/rstcheck
#     args: ["--report-level", "warning"]
tools:
  rstcheck: {}
  swagger-cli: {}
  protoc: {}
  markdownlint: {}
  sphinx-build: {}

# Set enabled: false to skip a check entirely
checks:
  rest: { enabled: true }
  openapi: { enabled: true }
  graphql: { enabled: true }
  proto: { enabled: true }
  markdown: { enabled: true }
  sphinx: { enabled: true }
  access-level: { enabled: true }
  formatting: { enabled: true }

# Banner every reST page carries, e.g. "INTERNAL DOCUMENTATION - Level 2"
access_level:
  marker: "DOCUMENTATION - Level"

# Characters the core canon forbids in docs/
formatting:
  forbid_emoji: true
  forbid_em_dash: true
  patterns: []
  # - name: smart quotes
  #   pattern: "[\\u201C\\u201D]"
  #   message: Curly quotes found

validation:
  fail_on_warning: false
  tool_timeout_ms: 120000
  exit_codes:
    success: 0
    error: 1
    warning_only: 0
`;

export const CANONIGNORE_TEMPLATE = `# Files canon-check never scans (gitignore syntax)
${DEFAULT_IGNORE_PATTERNS.join('\n')}
`;
