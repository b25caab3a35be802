/**
 * TextNormalizer Test
 */

import { describe, it, expect } from "@jest/globals";
import { TextNormalizer } from "@/extractors/common/TextNormalizer";

describe("TextNormalizer.clean", () => {
  it("연속 공백과 줄바꿈을 공백 하나로 합쳐야 함", () => {
    expect(TextNormalizer.clean("  Great\n\n  stay\t here ")).toBe("Great stay here");
  });

  it("공백만 있거나 비어 있으면 null을 반환해야 함", () => {
    expect(TextNormalizer.clean(" \n\t ")).toBeNull();
    expect(TextNormalizer.clean("")).toBeNull();
    expect(TextNormalizer.clean(null)).toBeNull();
    expect(TextNormalizer.clean(undefined)).toBeNull();
  });
});
