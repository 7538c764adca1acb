import "@testing-library/jest-dom/vitest";
import { afterEach } from "vitest";
import { cleanup } from "@testing-library/react";

// Only jsdom test files render anything
if (typeof document !== "undefined") {
  afterEach(() => {
    cleanup();
  });
}
