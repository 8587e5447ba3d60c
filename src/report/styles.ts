/**
 * Stylesheet shared by every report page (written once as report.css)
 */

export const REPORT_CSS = `body {
  color: #000000;
  background-color: #ffffff;
  font-family: sans-serif;
  margin: 1em 2em;
}

a:link, a:visited {
  color: #284fa8;
  text-decoration: underline;
}

h1.title {
  font-size: 1.4em;
  border-bottom: 3px solid #6688d4;
  padding-bottom: 0.2em;
}

div.location {
  margin-bottom: 1em;
}

table.summary {
  border-collapse: collapse;
  margin-bottom: 1.5em;
}

table.summary th,
table.summary td {
  padding: 0.2em 0.8em;
  text-align: right;
}

td.summaryLabel {
  text-align: left;
  font-weight: bold;
}

table.fileList,
table.functionList {
  border-collapse: collapse;
  width: 100%;
}

table.fileList th,
table.functionList th {
  background-color: #6688d4;
  color: #ffffff;
  padding: 0.3em 0.6em;
}

table.fileList th a:link,
table.fileList th a:visited {
  color: #ffffff;
}

table.fileList td,
table.functionList td {
  padding: 0.2em 0.6em;
  border-bottom: 1px solid #dae7fe;
}

td.coverFile,
td.coverDirectory,
td.coverFn {
  text-align: left;
  font-family: monospace;
}

td.coverBar {
  width: 120px;
}

div.bar {
  width: 100px;
  height: 10px;
  border: 1px solid #000000;
  background-color: #ffffff;
}

div.barFill {
  height: 10px;
}

.coverPerHi, .coverNumHi, .coverFnHi { background-color: #a7fc9d; text-align: right; }
.coverPerMed, .coverNumMed { background-color: #ffea20; text-align: right; }
.coverPerLo, .coverNumLo, .coverFnLo { background-color: #ff0000; text-align: right; }
.coverNone { background-color: #dae7fe; text-align: right; }
.coverBarHi { background-color: #a7fc9d; }
.coverBarMed { background-color: #ffea20; }
.coverBarLo { background-color: #ff0000; }

div.legend {
  margin-bottom: 1em;
  font-size: 0.9em;
}

div.legend span {
  padding: 0 0.4em;
}

.coverLegendCovHi { background-color: #a7fc9d; }
.coverLegendCovMed { background-color: #ffea20; }
.coverLegendCovLo { background-color: #ff0000; }
.coverLegendCov { background-color: #cad7fe; }
.coverLegendNoCov { background-color: #ff6230; }

p.missingSource {
  background-color: #fff4c2;
  border: 1px solid #e0c84a;
  padding: 0.5em;
}

pre.source {
  font-family: monospace;
  margin-top: 1em;
}

span.lineNum {
  background-color: #efe383;
}

span.lineCov {
  background-color: #cad7fe;
}

span.lineNoCov {
  background-color: #ff6230;
}

span.branchCov {
  background-color: #cad7fe;
}

span.branchNoCov {
  background-color: #ff6230;
}

span.branchNoExec {
  background-color: #ff6230;
}

div.footer {
  margin-top: 2em;
  padding-top: 0.3em;
  border-top: 3px solid #6688d4;
  font-size: 0.8em;
}
`
