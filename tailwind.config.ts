import type { Config } from "tailwindcss";

export default {
  content: ["./index.html", "./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        chart: {
          backdrop: "#e2e8f0",
          surface: "#f8fafc",
          border: "#cbd5e1",
          text: "#0f172a",
          muted: "#64748b",
          secondary: "#475569",
        },
        accent: {
          cyan: "#06b6d4",
          amber: "#d97706",
          red: "#ef4444",
        },
      },
      animation: {
        "slide-in": "slideIn 0.3s ease-out",
      },
      keyframes: {
        slideIn: {
          "0%": { transform: "translateY(-10px)", opacity: "0" },
          "100%": { transform: "translateY(0)", opacity: "1" },
        },
      },
    },
  },
  plugins: [],
} satisfies Config;
