/**
 * Template literals for the init command's generated files.
 */

export const CONFIG_TEMPLATE = `# modsync configuration
#
# Every key is optional; the values below are the defaults.
#
# Commands:
#   modsync discover   - list schema modules
#   modsync sync       - rewrite workspace manifests
#   modsync validate   - check client directories
#   modsync scaffold   - create a module from templates/module

# Directory holding one subdirectory per schema module
schema_root: proto

discovery:
  hidden_prefix: "."
  exclude:
    - proto
  sort: true

# Names the scaffolder refuses to create
reserved_names:
  - core
  - common
  - google
  - grpc
  - validate

# Built-in ecosystems: rust, go, python, typescript, java.
# Entries here are merged over the built-in ones; new names add ecosystems.
ecosystems:
  # java:
  #   enabled: false
  # rust:
  #   manifest: clients/rust/Cargo.toml
  #   section: workspace.members
  #   member_template: "{module}"

structure:
  ignore:
    - proto
    - target
    - node_modules
    - .venv
    - packages
    - com
    - google
    - validate

templates:
  dir: templates/module
  files:
    - source: README.md.template
      target: "{{MODULE_NAME}}/README.md"
    - source: module.proto.template
      target: "{{MODULE_NAME}}/{{VERSION}}/{{MODULE_FILE}}.proto"
`;

export const README_TEMPLATE = `# {{MODULE_NAME_TITLE}}

{{MODULE_DESCRIPTION}}

## Layout

- \`{{VERSION}}/{{MODULE_FILE}}.proto\`: {{ENTITY_NAME}} messages and the {{MODULE_NAME_TITLE}}Service definition

Created {{DATE}}.
`;

export const MODULE_PROTO_TEMPLATE = `syntax = "proto3";

package {{MODULE_FILE}}.{{VERSION}};

// {{MODULE_DESCRIPTION}}
service {{MODULE_NAME_TITLE}}Service {
  rpc Get{{ENTITY_NAME}}(Get{{ENTITY_NAME}}Request) returns (Get{{ENTITY_NAME}}Response);
  rpc List{{ENTITY_NAME}}s(List{{ENTITY_NAME}}sRequest) returns (List{{ENTITY_NAME}}sResponse);
}

message {{ENTITY_NAME}} {
  string id = 1;
  string name = 2;
}

message Get{{ENTITY_NAME}}Request {
  string {{ENTITY_NAME_LOWER}}_id = 1;
}

message Get{{ENTITY_NAME}}Response {
  {{ENTITY_NAME}} {{ENTITY_NAME_LOWER}} = 1;
}

message List{{ENTITY_NAME}}sRequest {
  int32 page_size = 1;
  string page_token = 2;
}

message List{{ENTITY_NAME}}sResponse {
  repeated {{ENTITY_NAME}} items = 1;
  string next_page_token = 2;
}

enum {{MESSAGE_PREFIX}}Status {
  {{MODULE_NAME_UPPER}}_STATUS_UNSPECIFIED = 0;
  {{MODULE_NAME_UPPER}}_STATUS_ACTIVE = 1;
}
`;
