import React, {
  createContext,
  useCallback,
  useContext,
  useMemo,
  useState,
  ReactNode,
} from "react";
import {
  StyleRegistry,
  type StyleDefinition,
  type StyleEntries,
} from "@/styles/registry";

interface StyleRegistryContextType {
  registry: StyleRegistry;
  registerStyle: (tag: string, definition: StyleDefinition) => void;
  removeStyle: (tag: string) => void;
  setDefaultStyle: (definition: StyleDefinition) => void;
  strict: boolean;
}

const StyleRegistryContext = createContext<
  StyleRegistryContextType | undefined
>(undefined);

export const useStyleRegistry = (): StyleRegistryContextType => {
  const context = useContext(StyleRegistryContext);
  if (!context) {
    throw new Error(
      "useStyleRegistry must be used within a StyleRegistryProvider",
    );
  }
  return context;
};

// For consumers that also render outside a provider
export const useOptionalStyleRegistry = ():
  | StyleRegistryContextType
  | undefined => useContext(StyleRegistryContext);

interface StyleRegistryProviderProps {
  children: ReactNode;
  /** Initial styles; later changes to this prop are ignored. */
  styles?: StyleEntries;
  /** Controlled registry. While set, the register/remove callbacks do nothing. */
  registry?: StyleRegistry;
  /** Rethrow malformed markup instead of rendering it as plain text. */
  strict?: boolean;
}

export const StyleRegistryProvider: React.FC<StyleRegistryProviderProps> = ({
  children,
  styles,
  registry: controlled,
  strict = false,
}) => {
  const [owned, setOwned] = useState<StyleRegistry>(() =>
    StyleRegistry.create(styles),
  );

  const isControlled = controlled !== undefined;

  const registerStyle = useCallback(
    (tag: string, definition: StyleDefinition) => {
      if (isControlled) return;
      setOwned((current) => current.withStyle(tag, definition));
    },
    [isControlled],
  );

  const removeStyle = useCallback(
    (tag: string) => {
      if (isControlled) return;
      setOwned((current) => current.without(tag));
    },
    [isControlled],
  );

  const setDefaultStyle = useCallback(
    (definition: StyleDefinition) => {
      if (isControlled) return;
      setOwned((current) => current.withDefault(definition));
    },
    [isControlled],
  );

  const registry = controlled ?? owned;

  const value = useMemo(
    () => ({ registry, registerStyle, removeStyle, setDefaultStyle, strict }),
    [registry, registerStyle, removeStyle, setDefaultStyle, strict],
  );

  return (
    <StyleRegistryContext.Provider value={value}>
      {children}
    </StyleRegistryContext.Provider>
  );
};
