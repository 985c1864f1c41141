import type { CSSProperties } from "react";
import { RichText } from "./components/RichText";
import { ErrorBoundary } from "./components/ErrorBoundary";
import {
  StyleRegistryProvider,
  useStyleRegistry,
} from "./contexts/StyleRegistryContext";
import type { StyleEntries } from "./styles/registry";

const large: CSSProperties = { fontSize: 40 };

export const demoStyles: StyleEntries = {
  lg: { style: large },
  white: { style: { color: "hsl(0, 100%, 100%)" } },
  red: { style: { color: "hsl(0, 90%, 70%)" } },
  blue: { style: { color: "hsl(240, 90%, 70%)" } },
  rainbow: {
    style: { color: "hsl(0, 90%, 80%)" },
    markers: ["rainbow"],
  },
};

export const demoMarkup =
  "default[lg,red]red[lg,white]white[lg,blue]blue[lg,rainbow]rainbow[]default\n" +
  "[[escaped brackets]]\n" +
  "Press [rainbow]the button[] to change the default style.";

const mutedDefault = { style: { color: "gray" } };

function DefaultStyleToggle() {
  const { registry, setDefaultStyle } = useStyleRegistry();
  const muted = registry.getDefault().style?.color === "gray";

  return (
    <button
      type="button"
      onClick={() => setDefaultStyle(muted ? {} : mutedDefault)}
    >
      {muted ? "Reset default style" : "Mute default style"}
    </button>
  );
}

function App() {
  return (
    <ErrorBoundary>
      <StyleRegistryProvider styles={demoStyles} strict>
        <RichText markup={demoMarkup} />
        <DefaultStyleToggle />
      </StyleRegistryProvider>
    </ErrorBoundary>
  );
}

export default App;
