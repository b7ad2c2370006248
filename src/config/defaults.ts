/**
 * Template written by `cmdstack init` when no settings file exists yet.
 */
export function getDefaultSettingsYaml(): string {
    return `# cmdstack settings
# Commands are shell lines (or executables) you can run by name or alias.

log_level: warning            # error | warning | verbose

# Extra directories searched for is_executable commands, after
# ~/.config/cmdstack/executables and before PATH.
executable_search_paths: []
#  - ~/.local/bin

# Global environment (lowest priority above the shell's own environment)
env: {}

# Environment precedence, highest first:
#   command env > project env > global env > inherited shell env

projects: {}
#  my-api:
#    path: ~/dev/my-api         # must exist and live inside $HOME
#    description: My API
#    env:
#      DATABASE_URL: postgres://localhost:5432/dev
#    commands:
#      - command_name: build
#        alias: b               # aliases are unique across all projects
#      - command_name: test     # no alias: "test" always runs in my-api

commands: {}
#  hello: echo hello           # shorthand: just the command line
#
#  archive:
#    cmd: tar -czf \${output_file} \${source_dir}
#    description: Archive a directory
#    is_enabled: true
#    is_executable: false
#    env:
#      GZIP: "-9"
#    pre_exec:
#      - mkdir -p dist
#    post_exec:
#      - echo done
#    arguments:
#      - name: output_file
#        required: true
#      - name: source_dir
#        default: .
#      - name: verbose
#        type: bool
#        prefix: -v
`;
}
