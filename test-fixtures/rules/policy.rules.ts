rule("NO_STATIC_COPYLEFT", {
  severity: "error",
  message: "{id} is statically linked into {project}.",
  howToFix: "Link {id} dynamically.",
  when: isStaticallyLinked() && hasLicense("GPL-*"),
});

rule("DECLARED_LICENSE_REQUIRED", {
  target: "package",
  severity: "warning",
  violateWhen: "unmatched",
  message: "{id} declares no license.",
  when: hasAnyLicense("ONLY_DECLARED"),
});

licenseRule("UNKNOWN_DETECTED", "ONLY_DETECTED", {
  target: "package",
  severity: "hint",
  message: "{license} detected in {id}.",
  when: isLicenseRef() && isLicenseSource("DETECTED"),
});
