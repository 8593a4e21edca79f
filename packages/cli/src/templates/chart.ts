export const chartTemplate = `version: "0.1"
layout:
  width: 500
  height: 300
  origin: bottom-left

shapes:
  - type: line-chart
    margin: [20, 20]
    axis_stroke: { width: 0.5, color: purple }
    series:
      - points: [[0, 0], [60, 40], [120, 30], [180, 90], [240, 110]]
        stroke: { width: 1, color: blue }
      - points: [[0, 20], [60, 70], [120, 60], [180, 140], [240, 150]]
        stroke: { width: 1, color: red }
`;
