import { createRunPlan } from "../core/plan.js";
import { defineStep, Step } from "../core/step.js";

/*
 * Demo station: one step per authoring feature. Run it with
 *   stationctl run dist/stations/demo.js --secret FOO=test-secret
 */

class EmptyStep extends Step {
  run(): void {
    this.log("This step does nothing but log");
    this.logError("This line goes to stderr");
  }
}

class StepWithDisplayName extends Step {
  run(): void {}
}

class StepWithDescription extends Step {
  run(): void {}
}

class StepThatSetsState extends Step {
  run(): void {
    this.state.set("Foo", "Bar");
    this.state.set("Baz", 42);
  }
}

class StepThatReadsState extends Step {
  run(): void {
    this.log(`Foo is ${String(this.state.require("Foo"))}`);
    this.log(`Baz is ${String(this.state.get("Baz"))}`);
  }
}

class StepThatCanFail extends Step {
  run(): boolean {
    this.log("This step fails, but the run continues");
    return false;
  }
}

class StepWithImage extends Step {
  run(): void {}
}

class StepWithLink extends Step {
  run(): void {}
}

class StepWithLinkText extends Step {
  run(): void {}
}

class StepWithButtons extends Step {
  async run(): Promise<void> {
    const letter = await this.prompts.buttons(["A", "B", "C"], { prompt: "Pick a letter" });
    this.log(`You picked ${String(letter)}`);
    const number = await this.prompts.buttons(
      [
        ["One", 1],
        ["This is green", true],
        ["Two", 2],
      ],
      { prompt: "Pick a number" },
    );
    this.log(`You picked ${String(number)}`);
  }
}

class PassFailButtons extends Step {
  async run(): Promise<void> {
    const passed = await this.prompts.passFail({ prompt: "Does the LED blink?" });
    this.log(`You clicked ${passed ? "Pass" : "Fail"}`);
  }
}

class StepWithTextInput extends Step {
  async run(): Promise<void> {
    const name = await this.prompts.textInput("What is your name?", { size: 25 });
    this.log(`Hello, ${name}`);
  }
}

class StepWithRadios extends Step {
  async run(): Promise<void> {
    const choice = await this.prompts.radios("Pick one", ["Red", "Green", "Blue"]);
    this.log(`You picked ${choice.name}`);
  }
}

class StepWithCheckBoxes extends Step {
  async run(): Promise<void> {
    const choices = await this.prompts.checkboxes("Pick any", ["Red", "Green", "Blue"]);
    this.log(`You picked ${choices.map((c) => c.name).join(", ") || "nothing"}`);
  }
}

class StepWithSelect extends Step {
  async run(): Promise<void> {
    const choices = await this.prompts.select("Pick some", ["Red", "Green", "Blue"], { allowMultiple: true });
    this.log(`You picked ${choices.map((c) => c.name).join(", ") || "nothing"}`);
  }
}

class StepThatReadsSecret extends Step {
  async run(): Promise<void> {
    const value = await this.secret("FOO");
    this.log(`Secret FOO has ${value.length} characters`);
  }
}

class Shutdown extends Step {
  run(): void {
    this.log("Shutting down the fixture");
  }
}

export const plan = createRunPlan(
  [
    defineStep(EmptyStep),
    defineStep(StepWithDisplayName, { displayName: "This is a custom display name" }),
    defineStep(StepWithDescription, { description: "This is a custom description" }),
    defineStep(StepThatSetsState),
    defineStep(StepThatReadsState),
    defineStep(StepThatCanFail, { stopOnFail: false }),
    defineStep(StepWithImage, { image: "img/puppy.jpg" }),
    defineStep(StepWithLink, { link: "https://www.example.com" }),
    defineStep(StepWithLinkText, { link: ["https://www.example.com", "This is the link text"] }),
    defineStep(StepWithButtons),
    defineStep(PassFailButtons),
    defineStep(StepWithTextInput),
    defineStep(StepWithRadios),
    defineStep(StepWithCheckBoxes),
    defineStep(StepWithSelect),
    defineStep(StepThatReadsSecret),
  ],
  { finalizer: defineStep(Shutdown) },
);
