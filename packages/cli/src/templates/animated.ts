export const animatedTemplate = `version: "0.1"
layout:
  width: 400
  height: 300
  origin: top-left

shapes:
  - type: circle
    id: ball
    center: [50, 150]
    radius: 20
    fill: { color: red }

animations:
  - type: motion
    href: ball
    dur: 3s
    fill: freeze
    points: [[0, 0], [150, -100], [300, 0]]
  - type: set
    href: ball
    begin: 3s
    to: blue
    attribute_name: fill
`;
