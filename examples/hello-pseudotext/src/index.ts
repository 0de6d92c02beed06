import { Color, GlyphSize, PseudoTextError } from "@pseudotext/core";
import { createNodePseudoText, renderPseudoText } from "@pseudotext/node";

try {
  const hello = createNodePseudoText();
  hello.setContent("HELLO!");
  process.stdout.write(`${hello.describe()}\n`);
  hello.render({ row: 3, column: 3 });

  const welcome = createNodePseudoText({
    content: "WELCOME!",
    inkChar: "@",
    fillChar: " ",
    glyphSize: GlyphSize.Big,
    color: Color.BrightGreen,
  });
  welcome.render({ row: 10, column: 10 });

  renderPseudoText("FINALLY!", "$", " ", GlyphSize.Big, Color.BrightYellow, {
    row: 20,
    column: 20,
  });
} catch (error) {
  if (!(error instanceof PseudoTextError)) throw error;
  process.stderr.write(`hello-pseudotext: ${error.code}: ${error.message}\n`);
  process.exitCode = 1;
}
