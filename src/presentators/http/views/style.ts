export const STYLESHEET = `body {
  margin: 0;
  font-family: system-ui, sans-serif;
  background: #10141a;
  color: #e6e6e6;
}

main {
  max-width: 960px;
  margin: 2rem auto;
  padding: 0 1rem;
}

form {
  display: grid;
  gap: 0.5rem;
}

textarea,
select,
button {
  font: inherit;
  padding: 0.5rem;
}

pre.result {
  overflow-x: auto;
  padding: 1rem;
  background: #000;
  font-family: ui-monospace, monospace;
  line-height: 1.1;
}

main.error h1 {
  color: #ff6b6b;
}
`;
