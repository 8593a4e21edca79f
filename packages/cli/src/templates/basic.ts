export const basicTemplate = `version: "0.1"
id: basic
layout:
  width: 400
  height: 300
  origin: bottom-left

markers:
  - id: arrow
    width: 10
    height: 10
    ref: [0, 3]
    orientation: auto
    shapes:
      - type: polygon
        points: [[0, 0], [0, 6], [9, 3]]
        fill: { color: black }

shapes:
  - type: rect
    id: frame
    position: [10, 290]
    width: 380
    height: 280
    stroke: { width: 1, color: gray }
  - type: circle
    id: sun
    center: [320, 230]
    radius: 30
    fill: { color: yellow, opacity: 0.8 }
    stroke: { width: 2, color: orange }
  - type: line
    from: [40, 40]
    to: [200, 120]
    stroke: { width: 2, color: black }
    markers: { end: arrow }
  - type: text
    position: [200, 30]
    content: "Hello, svgscribe"
    fill: { color: blue }
    font: { size: 16, family: Verdana }
`;
