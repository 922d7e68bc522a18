export function structuredPlotPrompt(context: string, subplotCount: number): string {
  return `You are digitizing a plot from a scientific paper.

The figure contains ${subplotCount} subplot(s). Read them left to right, top to bottom, and return exactly ${subplotCount} entries in that order.

For every subplot extract:
1. Axis labels and units for the x-axis and the left y-axis, and for the right y-axis if the plot has two y-axes
2. The plot title, if any
3. Every data series: its legend name exactly as printed, which y-axis it belongs to ("left" or "right"), its color and marker style, and the (x, y) value of each data point in axis units
4. Up to three short technical takeaways the plot supports

Context from the paper:
${context || '(none)'}

Return only JSON in this exact format:
{
  "subplots": [
    {
      "metadata": {
        "x_axis_label": "Temperature",
        "x_axis_unit": "K",
        "left_y_axis_label": "Resistivity",
        "left_y_axis_unit": "Ohm cm",
        "right_y_axis_label": "",
        "right_y_axis_unit": "",
        "plot_title": "",
        "is_dual_axis": false
      },
      "data_series": [
        {
          "name": "Sample A",
          "axis": "left",
          "color": "blue",
          "marker_style": "circle",
          "points": [{ "x": 100, "y": 2.5 }]
        }
      ],
      "technical_takeaways": ["Resistivity drops sharply below 120 K"]
    }
  ]
}`;
}

export function linePlotPrompt(context: string): string {
  return `You will be provided with a line chart. The chart may not be cropped well, so read only the plot in the center of the image.
In the chart there are one or more lines representing different data series.

1. Identify the different lines by their colors and labels.
2. For each line, extract the coordinates of the points that make up the line. Do not include points that are not part of the line.
3. If the chart has a title, x-axis label, y-axis label or units, extract them as well.

Context from the paper:
${context || '(none)'}

Output the data in exactly this format, one line per entry:

Name_of_Line_1: [[x1, y1], [x2, y2], ...]
title:
x_axis_label:
x_axis_unit:
y_left_axis_label:
y_left_axis_unit:

Do not output any other text.`;
}
