import { describe, test, expect } from "vitest";
import { ShellSyntaxError, parseCommandLine, tokenize, type WordToken } from "./shell-tokenizer.js";

function words(input: string): WordToken[] {
  return tokenize(input).filter((t): t is WordToken => t.type === "word");
}

function commandNames(input: string): string[] {
  return parseCommandLine(input).commands.map((c) => c.argv[0].value);
}

describe("tokenize", () => {
  test("removes quotes and keeps expansions verbatim", () => {
    const [echo, single, double] = words(`echo 'a b' "c $HOME"`);
    expect(echo.value).toBe("echo");
    expect(single).toMatchObject({ value: "a b", quoted: true, expansions: false });
    expect(double).toMatchObject({ value: "c $HOME", quoted: true, expansions: true });
  });

  test("handles backslash escapes", () => {
    expect(words("echo a\\ b").map((w) => w.value)).toEqual(["echo", "a b"]);
  });

  test("flags unquoted globs only", () => {
    const [, bare, quoted] = words(`ls *.ts "*.md"`);
    expect(bare.glob).toBe(true);
    expect(quoted.glob).toBe(false);
  });

  test("reads descriptor duplication as one redirect", () => {
    expect(tokenize("npm test 2>&1")[2]).toEqual({ type: "redirect", op: ">&", fd: 2, dup: "1" });
  });

  test("collects command substitutions", () => {
    expect(words("echo $(git rev-parse HEAD)")[1].substitutions).toEqual(["git rev-parse HEAD"]);
    expect(words("echo `date`")[1].substitutions).toEqual(["date"]);
    expect(words(`echo "$(ls "src")"`)[1].substitutions).toEqual([`ls "src"`]);
  });

  test("rejects unterminated quotes and heredocs", () => {
    expect(() => tokenize("echo 'abc")).toThrow(ShellSyntaxError);
    expect(() => tokenize('echo "abc')).toThrow("Unterminated double quote");
    expect(() => tokenize("cat <<EOF")).toThrow("Heredocs and here-strings are not allowed");
    expect(() => tokenize("diff <(ls) <(ls src)")).toThrow("Process substitution is not allowed");
  });
});

describe("parseCommandLine", () => {
  test("flattens lists and pipelines", () => {
    expect(commandNames("ls -la && git status | wc -l; pwd")).toEqual(["ls", "git", "wc", "pwd"]);
  });

  test("flattens subshells and keeps their redirections", () => {
    const parsed = parseCommandLine("(cd src && ls) > out.txt");
    expect(parsed.commands.map((c) => c.argv[0].value)).toEqual(["cd", "ls"]);
    expect(parsed.redirects).toHaveLength(1);
    expect(parsed.redirects[0].op).toBe(">");
    expect(parsed.redirects[0].target?.value).toBe("out.txt");
  });

  test("splits on newlines and ignores comments", () => {
    expect(commandNames("ls\n# a comment\npwd")).toEqual(["ls", "pwd"]);
  });

  test("separates leading assignments from the command", () => {
    const [command] = parseCommandLine("FOO=bar npm test").commands;
    expect(command.assignments.map((w) => w.value)).toEqual(["FOO=bar"]);
    expect(command.argv.map((w) => w.value)).toEqual(["npm", "test"]);
  });

  test("rejects background jobs", () => {
    expect(() => parseCommandLine("sleep 10 &")).toThrow(
      "Background execution with '&' is not allowed; use run_in_background"
    );
  });

  test("rejects dangling operators and empty input", () => {
    expect(() => parseCommandLine("ls &&")).toThrow("Command line ends with '&&'");
    expect(() => parseCommandLine("| ls")).toThrow("Unexpected '|'");
    expect(() => parseCommandLine("   ")).toThrow("Empty command");
    expect(() => parseCommandLine("(ls")).toThrow("Unbalanced '('");
    expect(() => parseCommandLine("ls)")).toThrow("Unbalanced ')'");
    expect(() => parseCommandLine("FOO=bar")).toThrow("Missing command name");
  });
});
