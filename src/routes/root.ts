import type { Hono } from "hono";

// Minimal kiosk page: polls the presented frame and forwards right-click and Esc.
const PAGE = `<!doctype html>
<html>
<head>
<meta charset="utf-8">
<title>Poster Kiosk</title>
<style>
html, body { margin: 0; height: 100%; background: #000; color: #fff; font: 32px sans-serif; }
#view { width: 100%; height: 100%; display: flex; align-items: center; justify-content: center; }
img { max-width: 100%; max-height: 100%; }
button { display: block; margin: 12px auto; font-size: 28px; min-width: 50%; }
</style>
</head>
<body>
<div id="view"></div>
<script>
const view = document.getElementById("view");
let version = -1;
const send = (input) => fetch("/display/input", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(input),
});
const render = (state) => {
    view.replaceChildren();
    const frame = state.frame;
    if (!frame) return;
    if (frame.kind === "placeholder") {
        view.textContent = frame.message;
    } else if (frame.kind === "poster" && state.image) {
        const img = document.createElement("img");
        img.src = "/display/frame/image?v=" + state.version;
        view.append(img);
    } else if (frame.kind === "menu") {
        const list = document.createElement("div");
        for (const item of frame.items) {
            const button = document.createElement("button");
            button.textContent = item.label;
            button.onclick = () => send({ type: "select", target: item.target });
            list.append(button);
        }
        view.append(list);
    }
};
const poll = async () => {
    const state = await fetch("/display/frame").then((r) => r.json());
    if (state.version !== version) {
        version = state.version;
        render(state);
    }
};
document.addEventListener("contextmenu", (e) => { e.preventDefault(); send({ type: "secondary-click" }); });
document.addEventListener("keydown", (e) => { if (e.key === "Escape") send({ type: "quit" }); });
setInterval(() => { poll().catch((err) => console.warn("frame poll failed", err)); }, 200);
</script>
</body>
</html>
`;

export function registerRoot(app: Hono) {
    app.get("/", (c) => c.html(PAGE));
}
