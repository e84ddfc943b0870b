export function vboxBuildUsage(): string {
  return [
    "Usage:",
    "  vbox-build --template PATH [options]",
    "",
    "Options:",
    "  --template PATH       Build template (.json, .yaml or .yml)",
    "  --cache-dir PATH      Download cache directory (default: ~/.cache/vbox-build)",
    "  --vboxmanage PATH     VBoxManage executable (default: found on PATH)",
    "  --force               Replace an existing output directory",
    "  --dry-run             Validate the template, print the build plan and exit",
    "  --help, -h            Show this help",
    "",
    "Environment:",
    "  VBOX_BUILD_CACHE_DIR  Download cache directory",
    "  VBOX_BUILD_VBOXMANAGE VBoxManage executable",
    "  VBOX_BUILD_LOG        Debug log level: debug | info | warn | error",
    "",
    "Examples:",
    "  vbox-build --template ./ubuntu.json",
    "  vbox-build --template ./ubuntu.yaml --cache-dir /var/cache/isos --force",
  ].join("\n");
}
