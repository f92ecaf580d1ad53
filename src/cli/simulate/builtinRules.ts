// Built-in simulation rules. The last rule matches anything.
import type { SimulationRule } from "./types";

export const BUILTIN_RULES: readonly SimulationRule[] = [
  {
    regex: "code|programming|python|javascript|function|class|implement",
    response:
      "Here's a code implementation:\n\n```\n# Implementation\n```\n\nThis demonstrates the functionality.",
  },
  {
    regex: "explain|what is|describe|definition",
    response: "Explanation:\n\nKey points:\n1. First\n2. Second\n3. Third",
  },
  {
    regex: "list|enumerate|steps|how to",
    response: "Steps:\n\n1. First\n2. Second\n3. Third",
  },
  {
    regex: "debug|error|fix|problem",
    response: "Troubleshooting:\n\n**Problem:** [issue]\n**Solution:** [fix]\n**Explanation:** [why]",
  },
  {
    regex: "review|analyze|evaluate",
    response: "Analysis:\n\n**Strengths:** Point 1\n**Improvements:** Point 2",
  },
  {
    regex: ".*",
    response: "I understand. Here's a response addressing your needs.",
  },
];
