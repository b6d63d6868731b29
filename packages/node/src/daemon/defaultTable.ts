import {
  type ActionDef,
  type ActionTableDefinition,
  DEFAULT_FIELD_NAMES,
  createTwoStateToggle,
} from "@barline/core";

/**
 * The built-in action table. Request ids:
 *
 *   0  quit       stop the daemon
 *   1  volume     refresh volume
 *   2  weather    refresh weather
 *   3  lang       toggle keyboard layout
 *   4  governor   toggle power profile
 *   5  mic        toggle microphone mute
 *   6  refresh    refresh time, load, temp and memory
 *
 * Each call builds fresh toggle procedures, so toggle state belongs to the
 * registry built from it.
 */
export function createDefaultActionTable(): ActionTableDefinition {
  const actions: readonly ActionDef[] = [
    { kind: "composite", name: "quit", terminate: true },
    { kind: "external", name: "time", command: "date +%H:%M:%S", target: "time" },
    { kind: "external", name: "load", command: "cut -d' ' -f1 /proc/loadavg", target: "load" },
    {
      kind: "external",
      name: "temp",
      command: `sensors | grep -F "Core 0" | awk '{print $3}' | cut -c2-5`,
      target: "temp",
    },
    {
      kind: "external",
      name: "volume",
      command: "amixer sget Master | tail -n1 | grep -o '[0-9]*%' | head -n1",
      target: "volume",
    },
    {
      kind: "external",
      name: "memory",
      command: "free -h | awk '/^Mem:/ {print $3}'",
      target: "memory",
    },
    { kind: "external", name: "date", command: "date +%d.%m.%Y", target: "date" },
    {
      kind: "external",
      name: "weather",
      command: "curl -s 'wttr.in/?format=%t' 2>/dev/null",
      target: "weather",
    },
    {
      kind: "toggle",
      name: "lang",
      target: "lang",
      procedure: createTwoStateToggle({
        states: [
          { label: "US", command: "setxkbmap us; setxkbmap -option numpad:mac" },
          { label: "RO", command: "setxkbmap ro -variant std" },
        ],
      }),
    },
    {
      kind: "toggle",
      name: "governor",
      target: "governor",
      procedure: createTwoStateToggle({
        states: [
          { label: "*", command: "powerprofilesctl set power-saver" },
          { label: "$", command: "powerprofilesctl set performance" },
        ],
      }),
    },
    {
      kind: "toggle",
      name: "mic",
      target: "mic",
      procedure: createTwoStateToggle({
        states: [
          { label: "0", command: "pactl set-source-mute @DEFAULT_SOURCE@ toggle" },
          { label: "1", command: "pactl set-source-mute @DEFAULT_SOURCE@ toggle" },
        ],
      }),
    },
    { kind: "composite", name: "refresh", steps: ["time", "load", "temp", "memory"] },
  ];
  return Object.freeze({
    fields: DEFAULT_FIELD_NAMES,
    actions,
    requests: ["quit", "volume", "weather", "lang", "governor", "mic", "refresh"],
  });
}
