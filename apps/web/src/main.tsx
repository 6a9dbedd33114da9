import React from "react";
import { createRoot } from "react-dom/client";
import App from "./app.js";

const root = document.getElementById("root");
if (!root) throw new Error("#root element is missing from index.html");

createRoot(root).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
);
