/**
 * Application entry
 *
 * Registers <gesture-whiteboard> and mounts one instance filling the page
 * unless the document already contains one.
 */
import "./ui/gesture-whiteboard";

function mount() {
  if (document.querySelector("gesture-whiteboard")) return;
  const board = document.createElement("gesture-whiteboard");
  board.style.position = "fixed";
  board.style.inset = "0";
  document.body.appendChild(board);
}

if (document.readyState === "loading") {
  document.addEventListener("DOMContentLoaded", mount);
} else {
  mount();
}
