// Catppuccin Mocha palette, semantic color names for easy theme swapping later
export interface ThemeColors {
  primary: string;   // active panel border + title
  selected: string;  // selected row
  warning: string;   // confirmation prompt
  error: string;     // destructive bindings
  text: string;      // rows
  subtext: string;   // inactive titles, hints
  dim: string;       // borders, placeholders
  accent: string;    // filter text
}

export interface Theme {
  name: string;
  colors: ThemeColors;
  border: "round" | "single" | "double" | "bold";
  icons: {
    cursor: string;
    filter: string;
    confirm: string;
  };
}

export const catppuccin: Theme = {
  name: "catppuccin",
  colors: {
    primary: "#89dceb",   // cyan
    selected: "#a6e3a1",  // green
    warning: "#f9e2af",   // yellow
    error: "#f38ba8",     // red
    text: "#cdd6f4",      // text
    subtext: "#a6adc8",   // subtext0
    dim: "#585b70",       // surface2
    accent: "#cba6f7",    // mauve
  },
  border: "round",
  icons: {
    cursor: "▸",
    filter: "/",
    confirm: "⚠",
  },
};

export const theme = catppuccin;
export const C = theme.colors;
export const I = theme.icons;
