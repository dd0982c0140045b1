/**
 * default-rules.ts — written to <home>/access.rules when no rules file exists.
 */

export const DEFAULT_RULES = `# Ordinance access rules, replayed in order at every start.
#
#   group <name> extends <parent>
#   user <alias> [<alias>...] in <group>
#   access <tag> [grant <group>...]
#   param <tag> number|string [min=] [max=] [round=] [min_repeats=] [max_repeats=] [default=] [rest]
#   allow|deny group:<name>|user:<alias> <tag>
#   restrict group:<name>|user:<alias> <tag> <index> [min=] [max=] [round=]
#
# Plugin commands are granted to the groups their plugins name once this
# file has been replayed.

group admin extends user
user console in admin
`;
